/**
 * LoginUsecase - exchanges credentials for a session id
 */

import type { RpcChannel } from "../port/rpc_channel.ts";
import { ApiStatus, type ConnInfo } from "../domain/types.ts";
import { AuthError } from "../domain/errors.ts";
import { normalizeEndpoint } from "../domain/session.ts";
import { logger } from "../infra/logger.ts";

export class LoginUsecase {
  constructor(private channel: RpcChannel) {}

  /**
   * Points the channel at the instance and installs the new session id.
   * Any previous session is dropped first, so the login request itself
   * never carries a sid.
   */
  async execute(conn: ConnInfo): Promise<true> {
    const endpoint = normalizeEndpoint(conn.hostUrl);
    const session = this.channel.session;
    session.endpoint = endpoint;
    session.token = "";

    logger.info("Logging in", { user: conn.user, endpoint });

    const resp = await this.channel.call("login", {
      user: conn.user,
      password: conn.password,
    });

    const sessionId = resp.content["session_id"];
    if (typeof sessionId !== "string" || resp.status !== ApiStatus.OK) {
      let message = `failed to log in at ${endpoint} as ${conn.user}`;
      if (resp.error !== null) {
        message += `: ${resp.error}`;
      }
      logger.warn("Login rejected", { user: conn.user, endpoint });
      throw new AuthError(message, endpoint, conn.user);
    }

    session.token = sessionId;
    logger.info("Logged in", { user: conn.user, session_id: sessionId });
    return true;
  }
}
