export { CreateReviewUseCase, type CreateReviewInput } from './create-review.use-case';
