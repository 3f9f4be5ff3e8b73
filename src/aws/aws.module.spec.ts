import { Injectable } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { AwsModule } from './aws.module';
import { AwsClientFactory } from './aws-client.factory';
import { AwsModuleOptions, AwsModuleOptionsFactory } from './interfaces';
import { ArtifactStorageService } from '../storage';
import { QueueService } from '../queue';

@Injectable()
class TestAwsOptionsFactory implements AwsModuleOptionsFactory {
  createAwsModuleOptions(): AwsModuleOptions {
    return { region: 'ap-southeast-2' };
  }
}

describe('AwsModule', () => {
  it('should provide the services with synchronous configuration', async () => {
    const module = await Test.createTestingModule({
      imports: [AwsModule.forRoot({ region: 'us-east-1' })],
    }).compile();

    expect(module.get(AwsClientFactory)).toBeInstanceOf(AwsClientFactory);
    expect(module.get(ArtifactStorageService)).toBeInstanceOf(
      ArtifactStorageService,
    );
    expect(module.get(QueueService)).toBeInstanceOf(QueueService);
  });

  it('should resolve options from a factory function', async () => {
    const useFactory = jest.fn().mockResolvedValue({ region: 'eu-west-1' });

    const module = await Test.createTestingModule({
      imports: [AwsModule.forRootAsync({ useFactory })],
    }).compile();

    expect(module.get(QueueService)).toBeInstanceOf(QueueService);
    expect(useFactory).toHaveBeenCalledTimes(1);
  });

  it('should resolve options from an options factory class', async () => {
    const module = await Test.createTestingModule({
      imports: [AwsModule.forRootAsync({ useClass: TestAwsOptionsFactory })],
    }).compile();

    expect(module.get(ArtifactStorageService)).toBeInstanceOf(
      ArtifactStorageService,
    );
  });

  it('should fail to compile with an invalid region', async () => {
    await expect(
      Test.createTestingModule({
        imports: [AwsModule.forRoot({ region: '' })],
      }).compile(),
    ).rejects.toThrow('region is required for AWS configuration');
  });

  it('should require an options source for async configuration', () => {
    expect(() => AwsModule.forRootAsync({})).toThrow(
      'AwsModule.forRootAsync requires useFactory, useClass or useExisting',
    );
  });
});
