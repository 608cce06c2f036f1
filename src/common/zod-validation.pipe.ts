import { BadRequestException, PipeTransform } from '@nestjs/common';
import { z } from 'zod';

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Parses a request value with a zod schema; responds 400 with the issue list on failure.
 * Usage: `@Body(new ZodValidationPipe(schema)) body: z.infer<typeof schema>`.
 */
export class ZodValidationPipe<T extends z.ZodTypeAny> implements PipeTransform<unknown, z.infer<T>> {
  constructor(private readonly schema: T) {}

  transform(value: unknown): z.infer<T> {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw new BadRequestException({ message: 'Validation failed', issues });
    }
    return result.data;
  }
}
