// apps/api/src/app.bootstrap.ts
import {
  BadRequestException,
  INestApplication,
  ValidationError,
  ValidationPipe,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';
import { ApiResponseInterceptor } from './common/interceptors/api-response.interceptor';
import type { ValidationIssue } from './common/pipes/zod-validation.pipe';

const API_PREFIX = 'api/v1';

/** `items.0.quantity`-style paths, one entry per failed constraint. */
export function flattenValidationErrors(
  errors: ValidationError[],
  parent = '',
): ValidationIssue[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => ({
      path,
      message,
    }));
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

// DTO and zod failures share one error code
function toValidationException(errors: ValidationError[]): BadRequestException {
  const issues = flattenValidationErrors(errors);
  const [first] = issues;
  return new BadRequestException({
    code: 'VALIDATION_FAILED',
    message: first ? `Validation failed at ${first.path}: ${first.message}` : 'Validation failed',
    issues,
  });
}

export function configureApp(app: INestApplication): void {
  app.setGlobalPrefix(API_PREFIX);
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
      exceptionFactory: toValidationException,
    }),
  );
  app.useGlobalInterceptors(new ApiResponseInterceptor(app.get(Reflector)));
  app.useGlobalFilters(new ApiExceptionFilter());
}

export function getApiPrefix(): string {
  return API_PREFIX;
}
