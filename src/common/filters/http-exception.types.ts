export interface ErrorResponse {
  statusCode: number;
  message: string | string[];
  error: string;
  details?: Record<string, unknown>;
  timestamp: string;
  path: string;
  method: string;
  correlationId?: string;
}
