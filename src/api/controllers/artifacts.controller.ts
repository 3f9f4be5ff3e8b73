import { isAbsolute, relative, resolve, sep } from 'path';
import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ArtifactsConfig } from '../../config/artifacts.config';
import { ArtifactStorageService } from '../../storage';
import { DownloadObjectDto, UploadArtifactsDto } from '../dto/artifacts';

@ApiTags('Artifacts')
@Controller('artifacts')
export class ArtifactsController {
  private readonly logger = new Logger(ArtifactsController.name);

  constructor(
    private readonly storageService: ArtifactStorageService,
    private readonly configService: ConfigService,
  ) {}

  @Post('upload')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Upload a local directory of artifacts to S3' })
  @ApiResponse({ status: 200, description: 'URIs of the uploaded objects' })
  @ApiResponse({ status: 400, description: 'Invalid request' })
  async uploadArtifacts(@Body() dto: UploadArtifactsDto) {
    const { root, upload, bucketModelArtifacts } =
      this.configService.getOrThrow<ArtifactsConfig>('artifacts');
    const directory = resolveWithinRoot(root, dto.directory);

    this.logger.log(`Uploading artifacts from directory: ${directory}`);

    const uris = await this.storageService.uploadArtifacts(directory, {
      upload,
      bucketModelArtifacts,
    });

    return {
      uploadedCount: uris.length,
      uris,
    };
  }

  @Post('download')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Download a single object to a local file' })
  @ApiResponse({ status: 200, description: 'Download attempted' })
  @ApiResponse({ status: 400, description: 'Invalid request' })
  async downloadObject(@Body() dto: DownloadObjectDto) {
    const { bucket, key } = dto;
    const { root } = this.configService.getOrThrow<ArtifactsConfig>('artifacts');
    const localFile = resolveWithinRoot(root, dto.localFile);

    if (localFile === resolve(root)) {
      throw new BadRequestException('localFile must name a file');
    }

    this.logger.log(`Downloading ${key} from bucket: ${bucket}`);

    await this.storageService.downloadObject(bucket, key, localFile);

    return { bucket, key, localFile };
  }
}

/**
 * Resolve a requested path against the artifacts root
 * @throws BadRequestException if the result lies outside the root
 */
function resolveWithinRoot(root: string, requested: string): string {
  const resolved = resolve(root, requested);
  const path = relative(root, resolved);

  if (path === '..' || path.startsWith(`..${sep}`) || isAbsolute(path)) {
    throw new BadRequestException(
      `Path ${requested} is outside the artifacts directory`,
    );
  }

  return resolved;
}
