// 게임 에러 계층: 모든 도메인 에러는 GameError 하위 클래스

import { HttpStatus } from '@nestjs/common';

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class BadRequestError extends GameError {
  constructor(message = 'Bad request', details?: Record<string, unknown>) {
    super('BAD_REQUEST', message, HttpStatus.BAD_REQUEST, details);
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class UnauthorizedError extends GameError {
  constructor(message = 'Unauthorized', details?: Record<string, unknown>) {
    super('UNAUTHORIZED', message, HttpStatus.UNAUTHORIZED, details);
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 422, details);
  }
}

export class InternalError extends GameError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}

// --- 이펙트 / 보상 판정 ---

export class InvalidModifierError extends GameError {
  constructor(message = 'Invalid modifier', details?: Record<string, unknown>) {
    super('INVALID_MODIFIER', message, 422, details);
  }
}

export class EmptyPoolError extends GameError {
  constructor(message = 'Reward pool is empty', details?: Record<string, unknown>) {
    super('EMPTY_POOL', message, 422, details);
  }
}

export class InvalidRarityTableError extends GameError {
  constructor(message = 'Invalid rarity table', details?: Record<string, unknown>) {
    super('INVALID_RARITY_TABLE', message, 422, details);
  }
}

/** random source가 [0,1) 밖의 값을 돌려줌: 호출자 버그 */
export class InvalidRandomValueError extends GameError {
  constructor(value: number) {
    super(
      'INVALID_RANDOM_VALUE',
      `Random source returned ${value}, expected [0, 1)`,
      HttpStatus.INTERNAL_SERVER_ERROR,
      { value },
    );
  }
}

export class HatchCooldownError extends GameError {
  constructor(retryAfterSeconds: number) {
    super(
      'HATCH_COOLDOWN',
      'Please wait before hatching again',
      HttpStatus.TOO_MANY_REQUESTS,
      { retryAfterSeconds },
    );
  }
}

export class EggLockedError extends GameError {
  constructor(eggId: string, required: number, current: number) {
    super(
      'EGG_LOCKED',
      `Egg ${eggId} unlocks after ${required} pets hatched`,
      HttpStatus.FORBIDDEN,
      { eggId, required, current },
    );
  }
}

export class ConfigValidationError extends GameError {
  constructor(message = 'Invalid configuration', details?: Record<string, unknown>) {
    super('CONFIG_INVALID', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}

export class ContentValidationError extends GameError {
  constructor(message = 'Content invalid', details?: Record<string, unknown>) {
    super('CONTENT_INVALID', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}
