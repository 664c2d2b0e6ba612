import { BadRequestException, PipeTransform } from '@nestjs/common';
import { ZodType, ZodTypeDef } from 'zod';

/**
 * Validates and transforms a request part with a zod schema. Failures
 * become a 400 listing each issue as `path: message`.
 */
export class ZodValidationPipe<TOutput, TInput = unknown>
  implements PipeTransform<unknown, TOutput>
{
  constructor(private readonly schema: ZodType<TOutput, ZodTypeDef, TInput>) {}

  transform(value: unknown): TOutput {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      throw new BadRequestException({
        status: 'error',
        message: 'Invalid request',
        issues: result.error.issues.map(
          (issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`
        ),
      });
    }
    return result.data;
  }
}
