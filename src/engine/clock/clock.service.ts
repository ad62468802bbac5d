import { Injectable } from '@nestjs/common';

/** 서버 시각 (초 단위, 소수 허용). 테스트에서는 하위 클래스로 고정 */
@Injectable()
export class ClockService {
  now(): number {
    return Date.now() / 1000;
  }
}
