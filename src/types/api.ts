import type { CheckboxItem } from "./note";
import type { UserRole } from "./user";

export interface ErrorResponse {
  error: string;
  issues?: string[];
}

export interface HealthResponse {
  status: "ok";
}

export interface SignupRequest {
  username: string;
  password: string;
  role: UserRole;
  parent_username?: string | null;
}

export interface SignupResponse {
  message: string;
}

export interface LoginRequest {
  username: string;
  password: string;
}

export interface LoginResponse {
  token: string;
  // Same value as `token`, under the OAuth2 field name.
  access_token: string;
  token_type: "bearer";
  role: UserRole;
}

export interface FolderRequest {
  name: string;
}

export interface FolderResponse {
  id: string;
  name: string;
  owner_username: string;
}

export interface NoteRequest {
  title: string;
  content?: string | null;
  tags?: string[] | null;
  checkbox_items?: { text: string; checked?: boolean }[] | null;
  folder_id?: string | null;
}

export interface NoteResponse {
  id: string;
  owner_username: string;
  title: string;
  content: string;
  tags: string[];
  checkbox_items: CheckboxItem[];
  folder_id: string | null;
}
