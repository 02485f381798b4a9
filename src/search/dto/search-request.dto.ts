/**
 * Search Request DTO
 * Input for POST /search (retrieval only, no generation)
 */

import {
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import type { SearchFilters } from '../../common/cache/cache-keys';
import type { SearchRequest } from '../types';

export class SearchRequestDto implements SearchRequest {
  @IsString()
  @IsNotEmpty()
  query!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  topK?: number; // default: 5

  @IsOptional()
  @IsString()
  namespace?: string;

  @IsOptional()
  @IsObject()
  filters?: SearchFilters;
}
