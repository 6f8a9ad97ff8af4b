import { Injectable, UnauthorizedException } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { compare } from "bcryptjs";
import { eq } from "drizzle-orm";
import { resolveJwtSecret } from "../common/config/app-config";
import { roleOf } from "../common/guards/roles.guard";
import { AuthUser } from "../common/interfaces/auth-user.interface";
import { DatabaseService } from "../database/database.service";
import { admins } from "../database/schema";
import { LoginDto } from "./dto/login.dto";

@Injectable()
export class AuthService {
  constructor(
    private readonly database: DatabaseService,
    private readonly jwtService: JwtService,
  ) {}

  async login(dto: LoginDto): Promise<{ accessToken: string; user: AuthUser }> {
    const admin = await this.database.db.query.admins.findFirst({
      where: eq(admins.username, dto.username.trim()),
    });
    if (!admin) {
      throw new UnauthorizedException("Invalid username or password");
    }

    const passwordOk = await compare(dto.password, admin.passwordHash);
    if (!passwordOk) {
      throw new UnauthorizedException("Invalid username or password");
    }

    const user: AuthUser = {
      sub: admin.id,
      role: roleOf(admin),
      username: admin.username,
    };
    const accessToken = await this.jwtService.signAsync(user, {
      secret: resolveJwtSecret(),
      expiresIn: "8h",
    });

    return { accessToken, user };
  }
}
