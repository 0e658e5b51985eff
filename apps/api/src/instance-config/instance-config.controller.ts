import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Headers,
  Patch,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { InstanceConfigService } from './instance-config.service';
import {
  InstanceConfigResponseDto,
  PatchInstanceConfigDto,
} from './dto/patch-instance-config.dto';
import type { InstanceConfig } from './instance-config.types';
import { Auth } from '../auth/decorators/auth.decorator';
import { CurrentUser } from '../auth/decorators/current-user.decorator';

@ApiTags('Instance Config')
@Controller('instance-config')
export class InstanceConfigController {
  constructor(private readonly instanceConfigService: InstanceConfigService) {}

  @Get()
  @Auth({ requireAdmin: true })
  @ApiOperation({ summary: 'Get instance configuration (instance admin only)' })
  @ApiResponse({ status: 200, description: 'Instance configuration', type: InstanceConfigResponseDto })
  async getConfig(): Promise<InstanceConfig> {
    return this.instanceConfigService.fetch();
  }

  @Patch()
  @Auth({ requireAdmin: true })
  @ApiOperation({ summary: 'Partially update instance configuration (instance admin only)' })
  @ApiHeader({
    name: 'If-Match',
    description: 'Expected version for optimistic concurrency',
    required: false,
  })
  @ApiResponse({ status: 200, description: 'Updated configuration', type: InstanceConfigResponseDto })
  @ApiResponse({ status: 400, description: 'Validation error' })
  @ApiResponse({ status: 409, description: 'Version conflict' })
  async patchConfig(
    @Body() dto: PatchInstanceConfigDto,
    @CurrentUser('id') userId: string,
    @Headers('if-match') ifMatch?: string,
  ): Promise<InstanceConfig> {
    return this.instanceConfigService.patch(dto, userId, parseIfMatch(ifMatch));
  }
}

function parseIfMatch(ifMatch: string | undefined): number | undefined {
  if (ifMatch === undefined || ifMatch === '') {
    return undefined;
  }

  const raw = ifMatch.replace(/^W\//, '').replace(/"/g, '').trim();
  if (!/^\d+$/.test(raw)) {
    throw new BadRequestException('If-Match must be a version number');
  }
  return parseInt(raw, 10);
}
