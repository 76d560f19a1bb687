export interface ApiErrorBody {
  code: string;
  message: string;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiErrorBody;
  correlationId: string;
}

export type ServiceStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthCheckResponse {
  status: ServiceStatus;
  service: string;
  database: 'connected' | 'disconnected';
  timestamp: string;
}
