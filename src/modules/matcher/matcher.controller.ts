import { Controller, Get, Post, Body, Query } from '@nestjs/common';
import { MatcherService } from './matcher.service';
import { MatchQueryDto, SearchQueryDto } from './dto';

@Controller('api')
export class MatcherController {
  constructor(private readonly matcherService: MatcherService) {}

  // =====================================================
  // BEST MATCH
  // =====================================================

  /**
   * POST /api/match
   * Ближайшая реплика и ступень каскада, которая её нашла
   */
  @Post('match')
  match(@Body() dto: MatchQueryDto) {
    return this.matcherService.findBestMatch(dto.query);
  }

  @Get('match')
  matchGet(@Query() dto: MatchQueryDto) {
    return this.matcherService.findBestMatch(dto.query);
  }

  // =====================================================
  // SEARCH
  // =====================================================

  @Post('search')
  search(@Body() dto: SearchQueryDto) {
    return this.matcherService.search(dto);
  }

  @Get('search')
  searchGet(@Query() dto: SearchQueryDto) {
    return this.matcherService.search(dto);
  }
}
