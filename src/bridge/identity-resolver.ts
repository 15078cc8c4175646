/**
 * Who a local sender appears as on the remote side.
 *
 * A sender who bound a remote account is shown with that account's display
 * name and avatar. Everyone else, and anyone whose lookup fails, is shown
 * with their local profile. Lookups never throw.
 *
 * Bindings are memoized for five minutes, including "not bound", and are
 * dropped by the bind commands. Remote users are memoized for the configured
 * TTL (a day by default); failed lookups are not cached.
 */

import type { LocalPlatform } from "../channels/types.js";
import { formatErrorMessage } from "../net-errors.js";
import { TtlCache } from "../util/ttl-cache.js";
import type { RemoteApi } from "./remote-api.js";
import type { UserIdentity } from "./types.js";

export const BINDING_TTL_MS = 5 * 60_000;
export const DEFAULT_USER_TTL_MS = 24 * 60 * 60_000;

interface Binding {
  remoteId: string | null;
}

export class IdentityResolver {
  private readonly bindings: TtlCache<string, Binding>;
  private readonly users: TtlCache<string, UserIdentity>;

  constructor(
    private readonly api: Pick<RemoteApi, "getBinding" | "fetchRemoteUser">,
    private readonly platform: Pick<LocalPlatform, "getProfile" | "mxcToHttp">,
    options: { userTtlMs?: number; now?: () => number } = {},
  ) {
    this.bindings = new TtlCache(BINDING_TTL_MS, options.now);
    this.users = new TtlCache(options.userTtlMs ?? DEFAULT_USER_TTL_MS, options.now);
  }

  /** Remote account bound to a local user; null when unbound or unknown. */
  async getBinding(localUserId: string): Promise<string | null> {
    const binding = await this.bindings.getOrLoad(localUserId, async () => ({
      remoteId: await this.api.getBinding(localUserId),
    }));
    return binding?.remoteId ?? null;
  }

  invalidateBinding(localUserId: string): void {
    this.bindings.delete(localUserId);
  }

  async getRemoteUser(remoteUserId: string): Promise<UserIdentity | null> {
    return this.users.getOrLoad(remoteUserId, () => this.api.fetchRemoteUser(remoteUserId));
  }

  async resolveSender(localUserId: string): Promise<UserIdentity> {
    let remote: UserIdentity | null = null;
    const bound = await this.getBinding(localUserId);
    if (bound) {
      remote = await this.getRemoteUser(bound);
      if (!remote) console.debug(`[identity] No remote profile for ${localUserId} (bound to ${bound})`);
    }
    if (remote?.avatarUrl) return remote;

    const profile = await this.localProfile(localUserId);
    return {
      displayName: remote?.displayName ?? profile?.displayName ?? localUserId,
      avatarUrl: profile?.avatarUrl ? this.platform.mxcToHttp(profile.avatarUrl) : null,
    };
  }

  private async localProfile(userId: string) {
    try {
      return await this.platform.getProfile(userId);
    } catch (err) {
      console.warn(`[identity] Profile lookup failed for ${userId}:`, formatErrorMessage(err));
      return null;
    }
  }
}
