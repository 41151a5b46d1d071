import { ValidationError } from 'class-validator';

/**
 * Flatten nested class-validator errors into "path: message" lines
 */
export function formatValidationErrors(errors: ValidationError[]): string[] {
  const formattedErrors: string[] = [];

  function extractErrors(errors: ValidationError[], prefix = ''): void {
    for (const error of errors) {
      const property = prefix ? `${prefix}.${error.property}` : error.property;

      for (const constraint of Object.values(error.constraints ?? {})) {
        formattedErrors.push(`${property}: ${constraint}`);
      }

      if (error.children && error.children.length > 0) {
        extractErrors(error.children, property);
      }
    }
  }

  extractErrors(errors);
  return formattedErrors;
}
