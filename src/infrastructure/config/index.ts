export { Environment, EnvironmentVariables, validate } from './env.validation';
export { setupSwagger } from './swagger.config';
