export interface ResponseMeta {
  total?: number;
}

/** Success envelope shared by every JSON endpoint. Errors are rendered by the error middleware. */
export class ApiResponse<T = unknown> {
  readonly success = true;
  readonly data?: T;
  readonly meta?: ResponseMeta;

  private constructor(readonly message: string, data?: T, meta?: ResponseMeta) {
    if (data !== undefined) this.data = data;
    if (meta) this.meta = meta;
  }

  static success<T>(message: string, data?: T, meta?: ResponseMeta): ApiResponse<T> {
    return new ApiResponse<T>(message, data, meta);
  }
}
