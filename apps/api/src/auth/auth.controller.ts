import { Body, Controller, HttpCode, Post, Res } from "@nestjs/common";
import { Response } from "express";
import { ACCESS_TOKEN_COOKIE } from "../common/guards/jwt-auth.guard";
import { AuthService } from "./auth.service";
import { LoginDto } from "./dto/login.dto";

type SameSiteMode = "lax" | "strict" | "none";

function parseSameSiteMode(): SameSiteMode {
  const raw = process.env.AUTH_COOKIE_SAMESITE?.toLowerCase();
  if (raw === "strict" || raw === "none") {
    return raw;
  }
  return "lax";
}

function cookieOptions() {
  const sameSite = parseSameSiteMode();
  return {
    httpOnly: true,
    sameSite,
    secure: process.env.NODE_ENV === "production" || sameSite === "none",
  };
}

@Controller("auth")
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post("login")
  @HttpCode(200)
  async login(
    @Body() dto: LoginDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    const result = await this.authService.login(dto);

    res.cookie(ACCESS_TOKEN_COOKIE, result.accessToken, {
      ...cookieOptions(),
      maxAge: 8 * 60 * 60 * 1000,
    });

    return result;
  }

  @Post("logout")
  @HttpCode(200)
  logout(@Res({ passthrough: true }) res: Response) {
    res.clearCookie(ACCESS_TOKEN_COOKIE, cookieOptions());
    return { ok: true };
  }
}
