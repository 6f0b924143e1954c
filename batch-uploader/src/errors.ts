export type NetworkErrorCode =
  | 'network_unknown'
  | 'network_unexpected_http_code'
  | 'network_server_limited'
  | 'network_server_rejected'
  | 'network_invalid_data'
  | 'json_unable_to_deserialize'
  | 'settings_fail'
  | 'failed_to_open_batch';

export class NetworkError extends Error {
  readonly code: NetworkErrorCode;
  readonly url?: string;
  readonly statusCode?: number;

  constructor(
    code: NetworkErrorCode,
    message: string,
    options: { url?: URL | string; statusCode?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'NetworkError';
    this.code = code;
    this.url = options.url?.toString();
    this.statusCode = options.statusCode;
  }
}
