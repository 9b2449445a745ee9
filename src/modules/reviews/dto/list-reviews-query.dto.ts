import { Transform } from 'class-transformer';
import { IsOptional, IsString } from 'class-validator';

export class ListReviewsQueryDto {
  // `?sentiment=a&sentiment=b` parses to an array; the last value wins.
  @Transform(({ value }: { value: unknown }) =>
    Array.isArray(value) ? value[value.length - 1] : value,
  )
  @IsOptional()
  @IsString()
  sentiment?: string;
}
