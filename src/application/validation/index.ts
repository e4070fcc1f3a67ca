export { toValidationError, validateInput, VALIDATOR_OPTIONS } from './validate-input';
