export { ReviewStoreIntegrityError } from './review-store-integrity.error';
