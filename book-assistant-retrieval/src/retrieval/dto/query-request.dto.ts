/**
 * Query Request DTO
 * Input for POST /query. Omitted retrieval parameters take the service
 * defaults (SIMILARITY_THRESHOLD, FILTER_LIMIT, MAX_SIMILARITY_DELTA).
 */

import {
  IsString,
  IsNotEmpty,
  IsEnum,
  IsOptional,
  IsIn,
  IsInt,
  IsNumber,
  IsArray,
  ArrayMaxSize,
  ValidateNested,
  Min,
  Max,
} from 'class-validator';
import { Type } from 'class-transformer';
import type { ChatRole } from '../types';

export class ChatTurnDto {
  @IsIn(['user', 'assistant'])
  declare role: ChatRole;

  @IsString()
  declare content: string;
}

export class FilterDto {
  @IsOptional()
  @IsString()
  declare book?: string | null;

  @IsOptional()
  @IsString()
  declare chapter?: string | null;

  @IsOptional()
  @IsString()
  declare author?: string | null;

  @IsOptional()
  @IsIn(['paragraph', 'summary'])
  declare type?: 'paragraph' | 'summary' | null;
}

export class QueryRequestDto {
  @IsString()
  @IsNotEmpty()
  declare query: string;

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(100)
  @ValidateNested({ each: true })
  @Type(() => ChatTurnDto)
  declare history?: ChatTurnDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FilterDto)
  declare filters?: FilterDto[];

  @IsOptional()
  @IsEnum(['retrieval_only', 'generation'])
  declare mode?: 'retrieval_only' | 'generation';

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  declare similarityThreshold?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  declare filterLimit?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  declare maxSimilarityDelta?: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  declare embeddingModel?: string;
}
