/**
 * Admin Service
 * =============
 * User management on top of the user store. Changes take effect on the next
 * request of the affected user, since the access gate reloads the identity
 * for every token.
 */

import { infrastructureCall, NotFoundError } from "../../shared/errors.js";
import { type AppLogger, logger as rootLogger } from "../../shared/logger.js";
import type { Role } from "../../shared/roles.js";
import type { UserStore } from "../auth/auth.repository.js";
import type { Identity, UserListFilter } from "../auth/auth.types.js";

export type UserStats = {
  total: number;
  active: number;
  inactive: number;
  byRole: Record<Role, number>;
};

export class AdminService {
  private readonly log: AppLogger;

  constructor(
    private readonly users: UserStore,
    log?: AppLogger
  ) {
    this.log = log ?? rootLogger.child("admin");
  }

  async listUsers(filter: UserListFilter = {}): Promise<Identity[]> {
    return infrastructureCall("users.list", () => this.users.list(filter));
  }

  async userStats(): Promise<UserStats> {
    const counts = await infrastructureCall("users.count", () => this.users.countUsers());
    const byRole: Record<Role, number> = { ADMIN: 0, CUSTOMER: 0, MODERATOR: 0 };
    const stats: UserStats = { total: 0, active: 0, inactive: 0, byRole };
    for (const entry of counts) {
      stats.total += entry.count;
      if (entry.isActive) {stats.active += entry.count;}
      else {stats.inactive += entry.count;}
      stats.byRole[entry.role] += entry.count;
    }
    return stats;
  }

  async getUser(id: string): Promise<Identity> {
    const identity = await infrastructureCall("users.findById", () => this.users.findById(id));
    if (!identity) {throw new NotFoundError("User", id);}
    return identity;
  }

  async setUserActive(id: string, isActive: boolean, actor: Identity): Promise<Identity> {
    const identity = await infrastructureCall("users.setActive", () => this.users.setActive(id, isActive));
    if (!identity) {throw new NotFoundError("User", id);}
    this.log.info("User status changed", { userId: id, isActive, by: actor.id });
    return identity;
  }

  async setUserRole(id: string, role: Role, actor: Identity): Promise<Identity> {
    const identity = await infrastructureCall("users.setRole", () => this.users.setRole(id, role));
    if (!identity) {throw new NotFoundError("User", id);}
    this.log.info("User role changed", { userId: id, role, by: actor.id });
    return identity;
  }
}
