import type { Response } from 'express';
import { ApiResponse, ResponseData } from '../../application/apiResponse.js';
import { HttpStatusName, statusCodeOf } from '../../application/httpStatus.js';

/**
 * Sends an envelope with the HTTP status its `status` field names.
 */
export function sendEnvelope(res: Response, envelope: ApiResponse<ResponseData>): void {
  res.status(statusCodeOf(envelope.status)).json(envelope);
}

export function sendError(
  res: Response,
  status: HttpStatusName,
  message: string,
  data: ResponseData = {}
): void {
  sendEnvelope(res, ApiResponse.builder().message(message).status(status).data(data).build());
}
