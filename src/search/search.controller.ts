/**
 * Search HTTP Controller
 * POST /search - vector retrieval without answer generation
 */

import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import { SearchRequestDto } from './dto/search-request.dto';
import { SearchService } from './search.service';
import type { SearchResult } from './types';

@Controller('search')
export class SearchController {
  constructor(private readonly searchService: SearchService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async search(
    @Body(ValidationPipe) body: SearchRequestDto,
  ): Promise<SearchResult> {
    return this.searchService.search(body);
  }
}
