import { Request } from "express";

export type AdminRole = "SUPERADMIN" | "STAFF";

export interface AuthUser {
  sub: string;
  role: AdminRole;
  username: string;
}

export interface AuthenticatedRequest extends Request {
  user?: AuthUser;
}
