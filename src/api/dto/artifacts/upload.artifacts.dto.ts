import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

/**
 * DTO for uploading a directory of artifacts
 * Bucket and upload flag always come from the configuration
 */
export class UploadArtifactsDto {
  @ApiProperty({
    description: 'Directory containing the artifacts, relative to ARTIFACTS_ROOT',
    example: 'run-42',
  })
  @IsString()
  @IsNotEmpty()
  directory!: string;
}
