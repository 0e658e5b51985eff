import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';

import { NotificationsService } from './notifications.service';
import { CreateNotificationDto, ListNotificationsQueryDto } from './dto/create-notification.dto';
import type { NotificationResponse } from './dto/notification-response.dto';
import { Auth } from '../auth/decorators/auth.decorator';
import { CurrentUser } from '../auth/decorators/current-user.decorator';

@ApiTags('Notifications')
@Controller('notifications')
export class NotificationsController {
  constructor(private readonly notificationsService: NotificationsService) {}

  @Post()
  @Auth()
  @ApiOperation({ summary: 'Create a notification configuration' })
  @ApiResponse({ status: 201, description: 'Notification created' })
  @ApiResponse({ status: 400, description: 'Validation error' })
  async create(
    @Body() dto: CreateNotificationDto,
    @CurrentUser('id') userId: string,
  ): Promise<NotificationResponse> {
    return this.notificationsService.create(dto, userId);
  }

  @Get()
  @Auth()
  @ApiOperation({ summary: 'List notification configurations' })
  @ApiQuery({ name: 'container', required: false })
  async list(@Query() query: ListNotificationsQueryDto): Promise<NotificationResponse[]> {
    return this.notificationsService.list(query.container);
  }

  @Get(':id')
  @Auth()
  @ApiOperation({ summary: 'Get a notification configuration' })
  @ApiResponse({ status: 404, description: 'Notification not found' })
  async get(@Param('id', ParseUUIDPipe) id: string): Promise<NotificationResponse> {
    return this.notificationsService.get(id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @Auth({ requireAdmin: true })
  @ApiOperation({ summary: 'Delete a notification configuration (instance admin only)' })
  @ApiResponse({ status: 204, description: 'Notification deleted' })
  @ApiResponse({ status: 404, description: 'Notification not found' })
  async delete(
    @Param('id', ParseUUIDPipe) id: string,
    @CurrentUser('id') userId: string,
  ): Promise<void> {
    await this.notificationsService.delete(id, userId);
  }
}
