export { registerValidationRoutes } from './validation';
export { registerPromptRoutes } from './prompts';
