import { NotFoundException, ParseUUIDPipe } from '@nestjs/common';

/**
 * Route id parameter pipe. Ids are UUID primary keys, so a malformed id names no record
 * and is answered with 404 before it reaches a query.
 */
export const entityIdPipe = (entity: string): ParseUUIDPipe =>
  new ParseUUIDPipe({
    exceptionFactory: () => new NotFoundException(`${entity} not found`),
  });
