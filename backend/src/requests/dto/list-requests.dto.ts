import {
  GUEST_REQUEST_PRIORITIES,
  GUEST_REQUEST_STATUSES,
  GuestRequestPriority,
  GuestRequestStatus,
} from '@hotel-concierge/shared-types';
import { IsIn, IsOptional } from 'class-validator';

export class ListRequestsDto {
  @IsOptional()
  @IsIn(GUEST_REQUEST_STATUSES)
  status?: GuestRequestStatus;

  @IsOptional()
  @IsIn(GUEST_REQUEST_PRIORITIES)
  priority?: GuestRequestPriority;
}
