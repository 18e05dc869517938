// apps/api/src/common/pipes/zod-validation.pipe.ts
import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';

export type ValidationIssue = { path: string; message: string };

function toIssue(issue: ZodIssue): ValidationIssue {
  return {
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  };
}

/** Parses a body through a zod schema; handlers receive the schema's output type. */
@Injectable()
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown): T {
    const result = this.schema.safeParse(value);
    if (result.success) return result.data;

    const issues = result.error.issues.map(toIssue);
    const [first] = issues;
    throw new BadRequestException({
      code: 'VALIDATION_FAILED',
      message: first
        ? `Validation failed at ${first.path}: ${first.message}`
        : 'Validation failed',
      issues,
    });
  }
}
