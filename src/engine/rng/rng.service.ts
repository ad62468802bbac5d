// splitmix64 기반 결정적 RNG: 해칭 1회마다 새 인스턴스

import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';

/** [0,1) 실수를 돌려주는 난수 소스 */
export type RandomSource = () => number;

const MASK_64 = 0xFFFFFFFFFFFFFFFFn;
const TWO_POW_53 = 2 ** 53;

export class Rng {
  private state: bigint;

  constructor(readonly seed: string) {
    this.state = this.hashSeed(seed);
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
    }
    return h === 0n ? 1n : h;
  }

  private nextRaw(): bigint {
    this.state = (this.state + 0x9E3779B97F4A7C15n) & MASK_64;
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & MASK_64;
    return (z ^ (z >> 31n)) & MASK_64;
  }

  /** 0.0 이상 1.0 미만: 상위 53비트만 사용 */
  next(): number {
    return Number(this.nextRaw() >> 11n) / TWO_POW_53;
  }

  /** RewardResolver 등에 넘길 RandomSource */
  asSource(): RandomSource {
    return () => this.next();
  }
}

@Injectable()
export class RngService {
  /** seed 기반 결정적 RNG. 같은 seed면 같은 해칭 결과 */
  create(seed: string): Rng {
    return new Rng(seed);
  }

  /** 호출마다 새 seed (재현이 필요하면 결과에 seed를 같이 남긴다) */
  randomSeed(): string {
    return randomUUID();
  }
}
