import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { HatchService } from './hatch.service.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { EggIdParamSchema, HatchBodySchema, type HatchBody } from './dto/hatch.dto.js';

@Controller('v1/eggs')
@UseGuards(AuthGuard)
export class EggsController {
  constructor(private readonly hatchery: HatchService) {}

  @Get()
  async listEggs(@UserId() userId: string) {
    return {
      eggs: this.hatchery.listEggs(),
      petsHatched: await this.hatchery.getPetsHatched(userId),
    };
  }

  @Get(':eggId/preview')
  async preview(@UserId() userId: string, @Param('eggId') rawEggId: string) {
    const eggId = EggIdParamSchema.parse(rawEggId);
    return { eggId, entries: await this.hatchery.preview(userId, eggId) };
  }

  @Post(':eggId/hatch')
  @HttpCode(HttpStatus.CREATED)
  async hatch(
    @UserId() userId: string,
    @Param('eggId') rawEggId: string,
    @Body(new ZodValidationPipe(HatchBodySchema)) body: HatchBody,
  ) {
    const eggId = EggIdParamSchema.parse(rawEggId);
    return this.hatchery.hatch(userId, eggId, body.count);
  }
}
