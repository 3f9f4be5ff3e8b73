import { DynamicModule, Global, Module, Provider, Type } from '@nestjs/common';
import {
  AwsModuleAsyncOptions,
  AwsModuleOptions,
  AwsModuleOptionsFactory,
  AWS_MODULE_OPTIONS,
} from './interfaces';
import { AwsClientFactory } from './aws-client.factory';
import { ArtifactStorageService } from '../storage/artifact-storage.service';
import { QueueService } from '../queue/queue.service';

const services = [AwsClientFactory, ArtifactStorageService, QueueService];

@Global()
@Module({})
export class AwsModule {
  /**
   * Register the module with synchronous configuration
   */
  static forRoot(options: AwsModuleOptions): DynamicModule {
    return {
      module: AwsModule,
      global: options.global ?? true,
      providers: [
        {
          provide: AWS_MODULE_OPTIONS,
          useValue: options,
        },
        ...services,
      ],
      exports: services,
    };
  }

  /**
   * Register the module with asynchronous configuration
   */
  static forRootAsync(options: AwsModuleAsyncOptions): DynamicModule {
    return {
      module: AwsModule,
      global: options.isGlobal ?? true,
      imports: options.imports || [],
      providers: [...this.createAsyncProviders(options), ...services],
      exports: services,
    };
  }

  private static createAsyncProviders(
    options: AwsModuleAsyncOptions,
  ): Provider[] {
    if (options.useFactory) {
      return [
        {
          provide: AWS_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject || [],
        },
      ];
    }

    const useClass: Type<AwsModuleOptionsFactory> | undefined =
      options.useClass;
    const useExisting: Type<AwsModuleOptionsFactory> | undefined =
      options.useExisting;

    if (useClass) {
      return [
        {
          provide: AWS_MODULE_OPTIONS,
          useFactory: async (optionsFactory: AwsModuleOptionsFactory) =>
            optionsFactory.createAwsModuleOptions(),
          inject: [useClass],
        },
        {
          provide: useClass,
          useClass: useClass,
        },
      ];
    }

    if (useExisting) {
      return [
        {
          provide: AWS_MODULE_OPTIONS,
          useFactory: async (optionsFactory: AwsModuleOptionsFactory) =>
            optionsFactory.createAwsModuleOptions(),
          inject: [useExisting],
        },
      ];
    }

    throw new Error(
      'AwsModule.forRootAsync requires useFactory, useClass or useExisting',
    );
  }
}
