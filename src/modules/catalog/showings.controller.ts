import { Controller, Get, Post, Body, Param, ParseUUIDPipe, UseGuards } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { CatalogService } from './catalog.service';
import { CreateShowingDto } from './dto/create-showing.dto';
import { ShowingResponseDto } from './dto/showing-response.dto';
import { toShowingResponse } from './catalog.mapper';
import { RateLimitGuard } from '@common/guards/rate-limit.guard';

@ApiTags('showings')
@Controller('showings')
@UseGuards(RateLimitGuard)
export class ShowingsController {
  constructor(private readonly catalogService: CatalogService) {}

  @Post()
  @ApiOperation({ summary: 'Schedule a showing on a screen' })
  @ApiResponse({ status: 201, description: 'Showing created', type: ShowingResponseDto })
  @ApiResponse({ status: 400, description: 'Start time is not before end time' })
  @ApiResponse({ status: 409, description: 'Screen already busy in that time window' })
  async create(@Body() dto: CreateShowingDto): Promise<ShowingResponseDto> {
    const showing = await this.catalogService.createShowing(dto);
    return toShowingResponse(showing);
  }

  @Get()
  @ApiOperation({ summary: 'List showings by start time' })
  @ApiResponse({ status: 200, description: 'List of showings', type: [ShowingResponseDto] })
  async findAll(): Promise<ShowingResponseDto[]> {
    const showings = await this.catalogService.findAllShowings();
    return showings.map(toShowingResponse);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get showing by ID' })
  @ApiResponse({ status: 200, description: 'Showing details', type: ShowingResponseDto })
  @ApiResponse({ status: 404, description: 'Showing not found' })
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<ShowingResponseDto> {
    const showing = await this.catalogService.findShowingById(id);
    return toShowingResponse(showing);
  }
}
