import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import { ThrottlerModule } from '@nestjs/throttler';
import { AppController } from './app.controller';
import { envSchema, validateEnv } from './env';
import { AppConfigModule } from './app-config.module';
import { AppConfigService } from './app-config.service';
import { SessionThrottlerGuard } from '../../common/throttling/session-throttler.guard';
import { HealthModule } from '../health/health.module';
import { DatabaseModule } from '../database/database.module';
import { RedisModule } from '../redis/redis.module';
import { AuthModule } from '../auth/auth.module';
import { UsersModule } from '../users/users.module';
import { BlogsModule } from '../blogs/blogs.module';
import { TagsModule } from '../tags/tags.module';
import { FilesModule } from '../files/files.module';
import { PostsModule } from '../posts/posts.module';
import { FollowsModule } from '../follows/follows.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv(envSchema),
    }),
    AppConfigModule,
    DatabaseModule,
    RedisModule,
    ThrottlerModule.forRootAsync({
      imports: [AppConfigModule],
      inject: [AppConfigService],
      useFactory: (cfg: AppConfigService) => [
        {
          // throttler v6 takes milliseconds
          ttl: cfg.rateLimitTtlSeconds() * 1000,
          limit: cfg.rateLimitLimit(),
        },
      ],
    }),
    HealthModule,
    AuthModule,
    UsersModule,
    BlogsModule,
    TagsModule,
    FilesModule,
    PostsModule,
    FollowsModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: SessionThrottlerGuard,
    },
  ],
})
export class AppModule {}
