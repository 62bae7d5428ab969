import { Injectable, Logger } from '@nestjs/common';
import {
  GuestRequestPriority,
  GuestRequestStatus,
  GuestRequestType,
} from '@hotel-concierge/shared-types';

import { GuestRequestDraft } from '../ai/ai.types';
import { DatabaseService } from '../database/database.service';
import { GuestRequestSink } from './request.sink';

export interface GuestRequestRecord {
  id: string;
  conversationId: string | null;
  userId: string;
  requestType: GuestRequestType;
  title: string;
  description: string;
  priority: GuestRequestPriority;
  status: GuestRequestStatus;
  roomNumber: string | null;
  assignedTo: string | null;
  notes: string | null;
  requestedAt: Date;
  completedAt: Date | null;
}

export interface RequestFilters {
  status?: GuestRequestStatus;
  priority?: GuestRequestPriority;
}

export interface RequestUpdate {
  status?: GuestRequestStatus;
  priority?: GuestRequestPriority;
  assignedTo?: string;
  notes?: string;
}

interface GuestRequestRow {
  id: string;
  conversation_id: string | null;
  user_id: string;
  request_type: GuestRequestType;
  title: string;
  description: string;
  priority: GuestRequestPriority;
  status: GuestRequestStatus;
  room_number: string | null;
  assigned_to: string | null;
  notes: string | null;
  requested_at: Date;
  completed_at: Date | null;
}

const REQUEST_COLUMNS = `id, conversation_id, user_id, request_type, title, description, priority,
  status, room_number, assigned_to, notes, requested_at, completed_at`;

const toRecord = (row: GuestRequestRow): GuestRequestRecord => ({
  id: row.id,
  conversationId: row.conversation_id,
  userId: row.user_id,
  requestType: row.request_type,
  title: row.title,
  description: row.description,
  priority: row.priority,
  status: row.status,
  roomNumber: row.room_number,
  assignedTo: row.assigned_to,
  notes: row.notes,
  requestedAt: row.requested_at,
  completedAt: row.completed_at,
});

@Injectable()
export class RequestsService extends GuestRequestSink {
  private readonly logger = new Logger(RequestsService.name);

  constructor(private readonly databaseService: DatabaseService) {
    super();
  }

  async createRequest(fields: GuestRequestDraft): Promise<string> {
    const result = await this.databaseService.runQuery<{ id: string }>(
      `INSERT INTO public.guest_requests (
        conversation_id, user_id, request_type, title, description, priority, room_number
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING id`,
      [
        fields.conversationId,
        fields.userId,
        fields.requestType,
        fields.title,
        fields.description,
        fields.priority,
        fields.roomNumber,
      ],
    );

    const requestId = result.rows[0].id;
    this.logger.log(`Recorded ${fields.requestType} request ${requestId} (${fields.priority})`);
    return requestId;
  }

  async listRequests(filters: RequestFilters = {}): Promise<GuestRequestRecord[]> {
    const conditions: string[] = [];
    const params: string[] = [];

    if (filters.status) {
      params.push(filters.status);
      conditions.push(`status = $${params.length}`);
    }
    if (filters.priority) {
      params.push(filters.priority);
      conditions.push(`priority = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.databaseService.runQuery<GuestRequestRow>(
      `SELECT ${REQUEST_COLUMNS}
       FROM public.guest_requests
       ${where}
       ORDER BY requested_at DESC`,
      params,
    );

    return result.rows.map(toRecord);
  }

  /**
   * Applies the given changes. Moving a request to `completed` stamps `completed_at`
   * the first time only. Returns `null` for an unknown id.
   */
  async updateRequest(id: string, update: RequestUpdate): Promise<GuestRequestRecord | null> {
    const result = await this.databaseService.runQuery<GuestRequestRow>(
      `UPDATE public.guest_requests
       SET status = COALESCE($2, status),
           priority = COALESCE($3, priority),
           assigned_to = COALESCE($4, assigned_to),
           notes = COALESCE($5, notes),
           completed_at = CASE
             WHEN $2 = 'completed' AND completed_at IS NULL THEN NOW()
             ELSE completed_at
           END,
           updated_at = NOW()
       WHERE id = $1
       RETURNING ${REQUEST_COLUMNS}`,
      [
        id,
        update.status ?? null,
        update.priority ?? null,
        update.assignedTo ?? null,
        update.notes ?? null,
      ],
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toRecord(result.rows[0]);
  }
}
