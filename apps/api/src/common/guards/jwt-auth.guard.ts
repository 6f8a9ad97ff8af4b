import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { resolveJwtSecret } from "../config/app-config";
import {
  AuthenticatedRequest,
  AuthUser,
} from "../interfaces/auth-user.interface";

export const ACCESS_TOKEN_COOKIE = "access_token";

@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private readonly jwtService: JwtService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractToken(request);

    if (!token) {
      throw new UnauthorizedException("Missing authorization token");
    }

    try {
      request.user = await this.jwtService.verifyAsync<AuthUser>(token, {
        secret: resolveJwtSecret(),
      });
      return true;
    } catch {
      throw new UnauthorizedException("Invalid or expired token");
    }
  }

  private extractToken(request: AuthenticatedRequest): string | null {
    const authHeader = request.headers.authorization;
    if (authHeader) {
      const [type, token] = authHeader.split(" ");
      if (type === "Bearer" && token) {
        return token;
      }
    }

    const cookies: Record<string, unknown> | undefined = request.cookies;
    const cookie = cookies?.[ACCESS_TOKEN_COOKIE];
    return typeof cookie === "string" && cookie ? cookie : null;
  }
}
