import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  Inject,
  InternalServerErrorException,
  Logger,
  Post,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ApiBody, ApiOkResponse, ApiTags } from '@nestjs/swagger';
import type { Meeting, ScheduleOutcome, SchedulingErrorJson } from '@voicedesk/types';
import { SchedulerService } from '../scheduling/scheduler.service.js';

export interface ScheduleMeetingDto {
  title: string;
  datetime: string;
  duration?: number;
  attendees?: string[];
}

const toHttpException = (error: SchedulingErrorJson) => {
  switch (error.kind) {
    case 'validation':
      return new UnprocessableEntityException(error);
    case 'conflict':
      return new ConflictException(error);
    case 'malformed_input':
      return new BadRequestException(error);
    case 'storage':
      return new ServiceUnavailableException(error);
    case 'internal':
      return new InternalServerErrorException(error);
  }
};

@ApiTags('meetings')
@Controller('meetings')
export class MeetingsController {
  private readonly logger = new Logger(MeetingsController.name);

  constructor(@Inject(SchedulerService) private readonly scheduler: SchedulerService) {}

  @Get()
  @ApiOkResponse({ description: 'Every booked meeting in booking order' })
  list(): Meeting[] {
    return this.scheduler.listMeetings();
  }

  @Post()
  @HttpCode(201)
  @ApiBody({
    schema: {
      type: 'object',
      required: ['title', 'datetime'],
      properties: {
        title: { type: 'string', example: 'Sync' },
        datetime: { type: 'string', example: '2024-01-08T10:00:00' },
        duration: { type: 'integer', example: 30 },
        attendees: { type: 'array', items: { type: 'string' } },
      },
    },
  })
  async create(@Body() body: ScheduleMeetingDto): Promise<Extract<ScheduleOutcome, { success: true }>> {
    const outcome = await this.scheduler.schedule(body);
    if (!outcome.success) {
      this.logger.warn(`POST /meetings rejected: ${outcome.error.code} ${outcome.message}`);
      throw toHttpException(outcome.error);
    }
    return outcome;
  }
}
