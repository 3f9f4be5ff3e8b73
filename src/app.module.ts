import { Module, Logger, ValidationPipe } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_PIPE } from '@nestjs/core';
import { ApiModule } from './api/api.module';
import { artifactsConfig, awsConfig } from './config';
import { AwsModule, AwsModuleOptions } from './aws';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '.env.local'],
      load: [awsConfig, artifactsConfig],
    }),
    AwsModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => {
        const config = configService.get<AwsModuleOptions>('aws');

        if (!config) {
          Logger.error('AWS configuration not found in environment variables');

          throw new Error('AWS configuration not found');
        }

        return config;
      },
      inject: [ConfigService],
    }),
    ApiModule,
  ],
  providers: [
    {
      provide: APP_PIPE,
      useValue: new ValidationPipe({
        transform: true,
        whitelist: true,
        forbidNonWhitelisted: true,
      }),
    },
  ],
})
export class AppModule {}
