export {
  AuthorizationDenied,
  ConstraintViolation,
  DomainError,
  StoreUnavailable,
  ValidationError,
} from './domain.errors';
