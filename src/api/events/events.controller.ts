import {
  BadRequestException,
  Controller,
  Get,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { EVENT_STATES, EntityStore, type EventState, type IngestEventRecord } from '../../store/entity-store';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

function isEventState(value: string): value is EventState {
  return EVENT_STATES.some((state) => state === value);
}

@ApiTags('events')
@Controller('events')
export class EventsController {
  constructor(private readonly store: EntityStore) {}

  @Get()
  @ApiOperation({ summary: 'List ingest events, newest first' })
  @ApiQuery({ name: 'state', required: false, enum: [...EVENT_STATES] })
  @ApiQuery({ name: 'limit', required: false, example: DEFAULT_LIMIT })
  async findAll(
    @Query('state') state?: string,
    @Query('limit') limit?: string,
  ): Promise<IngestEventRecord[]> {
    if (state !== undefined && !isEventState(state)) {
      throw new BadRequestException(`state must be one of ${EVENT_STATES.join(', ')}`);
    }
    let take = DEFAULT_LIMIT;
    if (limit !== undefined) {
      take = Number(limit);
      if (!Number.isInteger(take) || take < 1) {
        throw new BadRequestException('limit must be a positive integer');
      }
    }
    return this.store.listEvents({ state, limit: Math.min(take, MAX_LIMIT) });
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one ingest event with its attempt history' })
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<IngestEventRecord> {
    const event = await this.store.getEvent(id);
    if (!event) throw new NotFoundException('Event not found');
    return event;
  }
}
