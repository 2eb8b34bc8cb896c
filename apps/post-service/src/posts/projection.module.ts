import { Module } from '@nestjs/common';
import { ProjectionService } from './application/projection.service';
import { PostsModule } from './posts.module';

@Module({
  imports: [PostsModule],
  providers: [ProjectionService],
  exports: [ProjectionService],
})
export class ProjectionModule {}
