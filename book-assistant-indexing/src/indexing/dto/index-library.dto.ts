/**
 * Index Library Request DTO
 * Both directories default to the service configuration.
 */

import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class IndexLibraryDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  declare inputDir?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  declare outputDir?: string;
}
