import { Request, Response, NextFunction } from 'express';

// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: string;
  DATABASE_URL: string;
  // Explanation service (OPTIONAL - falls back to rule-based reasons)
  AI_ENABLED: boolean;
  OPENAI_API_KEY?: string;
  OPENAI_MODEL: string;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  code?: string;
  timestamp: string;
}

export interface PaginatedResponse<T> extends ApiResponse<T[]> {
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
}

// Express extended types
export type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}

export interface ReadinessReport {
  ready: boolean;
  checks: { server: boolean; database: boolean; migrations: boolean };
  pendingMigrations: string[];
}
