/** Request and response shapes for the auth and user endpoints. */

export type Role = "admin" | "staff";

export interface User {
  id: string;
  username: string;
  name: string;
  email: string;
  role: Role;
  active: boolean;
}

export interface AuthLoginRequest {
  username: string;
  password: string;
}

export interface AuthLoginResponse {
  token: string;
  user: User;
}

export interface AuthMeResponse {
  user: User | null;
}

export interface PasswordRecoverResponse {
  sent: boolean;
  users: number;
}

export interface PasswordResetRequest {
  token: string;
  username: string;
  password: string;
  password2: string;
}

export interface ApiError {
  error: string;
  code?: string;
}

export interface UserCreateRequest {
  username: string;
  name: string;
  email?: string;
  role?: Role;
  password: string;
}

export interface UsersListResponse {
  users: User[];
}
