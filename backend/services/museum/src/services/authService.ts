// backend/services/museum/src/services/authService.ts
import bcrypt from "bcrypt";
import { HttpError } from "@shared/http/errors";
import { signAdminToken } from "@shared/middleware/authenticate";
import { logger } from "@shared/utils/logger";
import type { SuperuserCredentials } from "../config";
import type { AdminUserRepo } from "../repo/types";

export const BCRYPT_ROUNDS = 12;

export type AuthServiceOptions = {
  secretKey: string;
  tokenTtlSec: number;
  bcryptRounds?: number;
};

export type LoginResult = { token: string; expiresIn: number };

export type SuperuserOutcome = "created" | "exists";

export class AuthService {
  private readonly rounds: number;

  constructor(
    private readonly users: AdminUserRepo,
    private readonly opts: AuthServiceOptions
  ) {
    this.rounds = opts.bcryptRounds ?? BCRYPT_ROUNDS;
  }

  async login(username: string, password: string): Promise<LoginResult> {
    const user = await this.users.findByUsername(username);
    const ok = user ? await bcrypt.compare(password, user.passwordHash) : false;
    if (!user || !ok) {
      logger.warn({ username }, "admin login rejected");
      throw new HttpError(401, "Invalid username or password", "INVALID_CREDENTIALS");
    }
    const token = signAdminToken(
      { sub: user.id, username: user.username, isSuperuser: user.isSuperuser },
      this.opts.secretKey,
      this.opts.tokenTtlSec
    );
    logger.info({ username }, "admin login");
    return { token, expiresIn: this.opts.tokenTtlSec };
  }

  /** Creates the initial administrator unless one with that username exists. */
  async ensureSuperuser(creds: SuperuserCredentials): Promise<SuperuserOutcome> {
    const existing = await this.users.findByUsername(creds.username);
    if (existing) {
      logger.info({ username: creds.username }, "superuser already exists");
      return "exists";
    }
    const passwordHash = await bcrypt.hash(creds.password, this.rounds);
    await this.users.create({
      username: creds.username,
      email: creds.email,
      passwordHash,
      isSuperuser: true,
    });
    logger.info({ username: creds.username }, "superuser created");
    return "created";
  }
}
