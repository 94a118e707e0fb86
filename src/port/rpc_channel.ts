/**
 * RpcChannel port - one API operation in, one Envelope out
 */
import type { Envelope, JsonObject, SessionState } from "../domain/types.ts";

export interface RpcChannel {
  readonly session: SessionState;
  call(operation: string, parameters?: JsonObject): Promise<Envelope>;
}
