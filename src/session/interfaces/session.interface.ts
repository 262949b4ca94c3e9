export interface SessionData {
  userId: number;
  username: string;
  ipAddress?: string;
  userAgent?: string;
  createdAt: string;
  expiresAt: string;
}

export interface CreateSessionDto {
  userId: number;
  username: string;
  token: string;
  ipAddress?: string;
  userAgent?: string;
}
