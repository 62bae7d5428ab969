import {
  GUEST_REQUEST_PRIORITIES,
  GUEST_REQUEST_STATUSES,
  GuestRequestPriority,
  GuestRequestStatus,
} from '@hotel-concierge/shared-types';
import { IsIn, IsOptional, IsString, MaxLength } from 'class-validator';

export class UpdateRequestDto {
  @IsOptional()
  @IsIn(GUEST_REQUEST_STATUSES)
  status?: GuestRequestStatus;

  @IsOptional()
  @IsIn(GUEST_REQUEST_PRIORITIES)
  priority?: GuestRequestPriority;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  assignedTo?: string;

  @IsOptional()
  @IsString()
  notes?: string;
}
