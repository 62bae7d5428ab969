import { Body, Controller, Get, NotFoundException, Param, Put, Query } from '@nestjs/common';

import { entityIdPipe } from '../common/pipes/entity-id.pipe';
import { ListRequestsDto } from './dto/list-requests.dto';
import { UpdateRequestDto } from './dto/update-request.dto';
import { GuestRequestRecord, RequestsService } from './requests.service';

@Controller('requests')
export class RequestsController {
  constructor(private readonly requestsService: RequestsService) {}

  @Get()
  async list(
    @Query() query: ListRequestsDto,
  ): Promise<{ requests: GuestRequestRecord[]; total: number }> {
    const requests = await this.requestsService.listRequests({
      status: query.status,
      priority: query.priority,
    });
    return { requests, total: requests.length };
  }

  @Put(':id/status')
  async update(
    @Param('id', entityIdPipe('Guest request')) requestId: string,
    @Body() dto: UpdateRequestDto,
  ): Promise<GuestRequestRecord> {
    const updated = await this.requestsService.updateRequest(requestId, dto);
    if (!updated) {
      throw new NotFoundException(`Guest request ${requestId} not found`);
    }
    return updated;
  }
}
