import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { PlayerEffectsService } from './player-effects.service.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  ApplyEffectBodySchema,
  EffectIdParamSchema,
  type ApplyEffectBody,
} from './dto/apply-effect.dto.js';

@Controller('v1/effects')
@UseGuards(AuthGuard)
export class EffectsController {
  constructor(private readonly effects: PlayerEffectsService) {}

  @Get()
  async getEffects(@UserId() userId: string) {
    await this.effects.loadSubject(userId);
    return {
      aggregates: this.effects.getAggregates(userId),
      effects: this.effects.getActiveEffects(userId),
    };
  }

  @Post(':effectId')
  @HttpCode(HttpStatus.CREATED)
  async applyEffect(
    @UserId() userId: string,
    @Param('effectId') rawEffectId: string,
    @Body(new ZodValidationPipe(ApplyEffectBodySchema)) body: ApplyEffectBody,
  ) {
    const effectId = EffectIdParamSchema.parse(rawEffectId);
    const effects = await this.effects.applyEffect(userId, effectId, {
      duration: body.duration,
    });
    return { effects };
  }

  @Delete(':effectId')
  async removeEffect(@UserId() userId: string, @Param('effectId') rawEffectId: string) {
    const effectId = EffectIdParamSchema.parse(rawEffectId);
    return { removed: await this.effects.removeEffect(userId, effectId) };
  }
}
