import { SetMetadata } from "@nestjs/common";
import { AdminRole } from "../interfaces/auth-user.interface";

export const ROLES_KEY = "roles";

export const Roles = (...roles: AdminRole[]) => SetMetadata(ROLES_KEY, roles);
