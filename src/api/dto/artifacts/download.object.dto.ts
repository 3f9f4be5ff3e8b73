import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

/**
 * DTO for downloading a single object to a local file
 */
export class DownloadObjectDto {
  @ApiProperty({
    description: 'The bucket holding the object',
    example: 'model-artifacts',
  })
  @IsString()
  @IsNotEmpty()
  bucket!: string;

  @ApiProperty({
    description: 'The key of the object',
    example: 'run-42/model.bin',
  })
  @IsString()
  @IsNotEmpty()
  key!: string;

  @ApiProperty({
    description: 'File the object is written to, relative to ARTIFACTS_ROOT',
    example: 'run-42/model.bin',
  })
  @IsString()
  @IsNotEmpty()
  localFile!: string;
}
