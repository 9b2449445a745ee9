export { ListReviewsUseCase, type ListReviewsInput } from './list-reviews.use-case';
