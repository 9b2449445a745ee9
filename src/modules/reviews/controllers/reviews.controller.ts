import { Body, Controller, Get, HttpCode, Post, Query, Req, UseGuards } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import '../../../common/types/express';
import { CreateReviewUseCase } from '../application/use-cases/create-review';
import { ListReviewsUseCase } from '../application/use-cases/list-reviews';
import { CreateReviewRequestDto } from '../dto/create-review-request.dto';
import { ListReviewsQueryDto } from '../dto/list-reviews-query.dto';
import { toReviewResponse, type ReviewResponseDto } from '../dto/review-response.dto';

@Controller('reviews')
@UseGuards(ThrottlerGuard)
export class ReviewsController {
  constructor(
    private readonly createReview: CreateReviewUseCase,
    private readonly listReviews: ListReviewsUseCase,
  ) {}

  @Post()
  @HttpCode(200)
  async create(
    @Req() request: Request,
    @Body() payload: CreateReviewRequestDto,
  ): Promise<ReviewResponseDto> {
    const review = await this.createReview.execute({
      requestId: request.requestId ?? randomUUID(),
      text: payload.text,
    });

    return toReviewResponse(review);
  }

  @Get()
  async list(
    @Req() request: Request,
    @Query() query: ListReviewsQueryDto,
  ): Promise<ReviewResponseDto[]> {
    const reviews = await this.listReviews.execute({
      requestId: request.requestId ?? randomUUID(),
      sentiment: query.sentiment,
    });

    return reviews.map(toReviewResponse);
  }
}
