import { Module } from '@nestjs/common';
import { ArtifactsController, QueueController } from './controllers';

@Module({
  controllers: [ArtifactsController, QueueController],
})
export class ApiModule {}
