import { IsDefined, IsString } from 'class-validator';

export class CreateReviewRequestDto {
  // Empty text is a valid review; only presence and type are enforced.
  @IsDefined()
  @IsString()
  text!: string;
}
