/**
 * HTTP wire shapes (snake_case, as clients see them)
 */

export interface AuthRequestBody {
  username: string;
  external_identity: string;
  secret: string;
}

export interface AuthSuccessResponse {
  success: true;
  token: string;
  user_id: number;
}

export interface ErrorResponse {
  error: string;
}

export interface ProfileResponse {
  user_id: number;
  username: string;
  external_identity: string;
  created_at: string;
}

export interface HealthResponse {
  status: "healthy";
  timestamp: string;
}
