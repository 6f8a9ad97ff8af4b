import { CanActivate, ExecutionContext, Injectable } from "@nestjs/common";
import { Reflector } from "@nestjs/core";
import { eq } from "drizzle-orm";
import { DatabaseService } from "../../database/database.service";
import { admins } from "../../database/schema";
import { ROLES_KEY } from "../decorators/roles.decorator";
import {
  AdminRole,
  AuthenticatedRequest,
} from "../interfaces/auth-user.interface";

export function roleOf(admin: { isSuperadmin: boolean }): AdminRole {
  return admin.isSuperadmin ? "SUPERADMIN" : "STAFF";
}

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly database: DatabaseService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const requiredRoles = this.reflector.getAllAndOverride<AdminRole[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );

    if (!requiredRoles || requiredRoles.length === 0) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const user = request.user;
    if (!user) return false;

    if (requiredRoles.includes(user.role)) {
      return true;
    }

    // Token role may be stale after a promotion.
    const fresh = await this.database.db.query.admins.findFirst({
      where: eq(admins.id, user.sub),
      columns: { isSuperadmin: true },
    });
    if (!fresh) return false;

    const freshRole = roleOf(fresh);
    if (requiredRoles.includes(freshRole)) {
      request.user = { ...user, role: freshRole };
      return true;
    }

    return false;
  }
}
