/**
 * Status names carried in response envelopes, with the code each one is sent as.
 */
export const HttpStatus = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  CONFLICT: 409,
  PAYLOAD_TOO_LARGE: 413,
  UNSUPPORTED_MEDIA_TYPE: 415,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export type HttpStatusName = keyof typeof HttpStatus;

export type HttpStatusCode = (typeof HttpStatus)[HttpStatusName];

export function statusCodeOf(name: HttpStatusName): HttpStatusCode {
  return HttpStatus[name];
}

export function isStatusName(value: string): value is HttpStatusName {
  return Object.prototype.hasOwnProperty.call(HttpStatus, value);
}

export function statusNameOf(code: number): HttpStatusName | undefined {
  return Object.keys(HttpStatus)
    .filter(isStatusName)
    .find((name) => HttpStatus[name] === code);
}
