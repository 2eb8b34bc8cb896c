import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BusService } from './infrastructure/bus/bus.service';
import { DatabaseService } from './infrastructure/database/database.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [DatabaseService, BusService],
  exports: [DatabaseService, BusService],
})
export class PlatformModule {}
