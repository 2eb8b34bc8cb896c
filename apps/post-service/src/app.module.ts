import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env';
import { PlatformModule } from './platform/platform.module';
import { PostsModule } from './posts/posts.module';
import { ProjectionModule } from './posts/projection.module';

const configModule = ConfigModule.forRoot({
  isGlobal: true,
  validate: validateEnv,
});

@Module({
  imports: [configModule, PlatformModule, PostsModule, ProjectionModule],
})
export class AppModule {}

/** Write side only: no projection runs while streams are republished. */
@Module({
  imports: [configModule, PlatformModule, PostsModule],
})
export class RepublishModule {}
