export * from './ZuoraConfig';
export { ConfigLoader } from './ConfigLoader';
export { ConfigValidator, ValidationResult, ValidationErrorDetail } from './ConfigValidator';
