import { Injectable, type PipeTransform } from '@nestjs/common';
import type { z, ZodIssue, ZodTypeAny } from 'zod';
import { InvalidInputError } from '../errors/game-errors.js';

/** `path: message` 형태, 최상위 값이면 (root) */
export function formatZodIssues(issues: ZodIssue[]): string[] {
  return issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

/** 요청 body 검증. 기본값이 채워진 파싱 결과를 넘긴다 */
@Injectable()
export class ZodValidationPipe<T extends ZodTypeAny> implements PipeTransform<unknown, z.output<T>> {
  constructor(private readonly schema: T) {}

  transform(value: unknown): z.output<T> {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      throw new InvalidInputError('Validation failed', {
        issues: formatZodIssues(result.error.issues),
      });
    }
    return result.data;
  }
}
