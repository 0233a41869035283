import { HttpStatusName } from './httpStatus.js';

export type ResponseData = Record<string, unknown>;

/**
 * Uniform body for every response the API sends, success or failure.
 */
export interface ApiResponse<TData extends ResponseData = ResponseData> {
  readonly message: string;
  readonly status: HttpStatusName;
  readonly data: Readonly<TData>;
}

export class ApiResponseBuilder<TData extends ResponseData> {
  private messageValue = '';
  private statusValue: HttpStatusName = 'OK';

  constructor(private readonly dataValue: TData) {}

  message(message: string): this {
    this.messageValue = message;
    return this;
  }

  status(status: HttpStatusName): this {
    this.statusValue = status;
    return this;
  }

  data<TNext extends ResponseData>(data: TNext): ApiResponseBuilder<TNext> {
    return new ApiResponseBuilder(data)
      .message(this.messageValue)
      .status(this.statusValue);
  }

  /**
   * Freezes the envelope and a copy of its data map. Values inside the map
   * are shared with the caller.
   */
  build(): ApiResponse<TData> {
    return Object.freeze({
      message: this.messageValue,
      status: this.statusValue,
      data: Object.freeze({ ...this.dataValue }),
    });
  }
}

export const ApiResponse = {
  builder(): ApiResponseBuilder<Record<string, never>> {
    return new ApiResponseBuilder<Record<string, never>>({});
  },
};
