import { Type } from "@nestjs/common";
import { Reflector } from "@nestjs/core";
import { ExecutionContextHost } from "@nestjs/core/helpers/execution-context-host";
import { Test, TestingModule } from "@nestjs/testing";
import { DatabaseService } from "../../database/database.service";
import { Roles } from "../decorators/roles.decorator";
import { AuthUser } from "../interfaces/auth-user.interface";
import { RolesGuard } from "./roles.guard";

@Roles("SUPERADMIN")
class PayrollStub {
  export(): void {}
}

class OpenStub {
  ping(): void {}
}

const mockDatabaseService = {
  db: {
    query: {
      admins: { findFirst: jest.fn() },
    },
  },
};

function contextFor(request: { user?: AuthUser }, target: Type<unknown>, handler: () => void) {
  return new ExecutionContextHost([request], target, handler);
}

describe("RolesGuard", () => {
  let guard: RolesGuard;
  const staff: AuthUser = { sub: "admin-2", role: "STAFF", username: "frontdesk" };

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RolesGuard,
        Reflector,
        { provide: DatabaseService, useValue: mockDatabaseService },
      ],
    }).compile();

    guard = module.get<RolesGuard>(RolesGuard);
  });

  it("lets routes without a role requirement through", async () => {
    await expect(
      guard.canActivate(contextFor({ user: staff }, OpenStub, OpenStub.prototype.ping)),
    ).resolves.toBe(true);
  });

  it("admits a superadmin token", async () => {
    const request = { user: { ...staff, role: "SUPERADMIN" as const } };

    await expect(
      guard.canActivate(contextFor(request, PayrollStub, PayrollStub.prototype.export)),
    ).resolves.toBe(true);
    expect(mockDatabaseService.db.query.admins.findFirst).not.toHaveBeenCalled();
  });

  it("re-reads the role when the token falls short", async () => {
    mockDatabaseService.db.query.admins.findFirst.mockResolvedValue({ isSuperadmin: true });
    const request: { user?: AuthUser } = { user: staff };

    await expect(
      guard.canActivate(contextFor(request, PayrollStub, PayrollStub.prototype.export)),
    ).resolves.toBe(true);
    expect(request.user?.role).toBe("SUPERADMIN");
  });

  it("denies staff members", async () => {
    mockDatabaseService.db.query.admins.findFirst.mockResolvedValue({ isSuperadmin: false });

    await expect(
      guard.canActivate(contextFor({ user: staff }, PayrollStub, PayrollStub.prototype.export)),
    ).resolves.toBe(false);
  });
});
