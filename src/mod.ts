export { TtrssClient, type TtrssClientOptions } from "./client.ts";
export {
  ApiStatus,
  type ConnInfo,
  type Envelope,
  type JsonObject,
  type NetworkConfig,
  type SessionState,
  type SubscribeRequest,
} from "./domain/types.ts";
export {
  CategoryId,
  FeedId,
  LABEL_BASE_INDEX,
  PLUGIN_FEED_BASE_INDEX,
} from "./domain/constants.ts";
export {
  ApiError,
  AuthError,
  ConfigError,
  ConnectionError,
  DecodeError,
  EncodeError,
  ProtocolError,
  TtrssError,
  WalkError,
} from "./domain/errors.ts";
export {
  decodeSubscribe,
  describeSubscribeStatus,
  NO_SUBSCRIBE_MESSAGE,
  SubscribeStatus,
  SubscriptionOutcome,
  type SubscribeResult,
} from "./domain/subscription.ts";
export {
  abort,
  CONTINUE,
  decodeFeedTree,
  FEED_TREE_ROOT_ID,
  FEED_TREE_ROOT_NAME,
  SKIP_SUBTREE,
  walkFeedTree,
  type FeedTreeKind,
  type FeedTreeNode,
  type FeedTreeVisitor,
  type WalkDecision,
} from "./domain/feed_tree.ts";
export { createSessionState, normalizeEndpoint } from "./domain/session.ts";
export { decodeEnvelope, NO_ERROR_TEXT } from "./gateway/envelope_decoder.ts";
export { TtrssRpcChannel } from "./gateway/ttrss_rpc_channel.ts";
export { FetchHttpClient } from "./gateway/fetch_http_client.ts";
export type { HttpClient } from "./port/http_client.ts";
export type { RpcChannel } from "./port/rpc_channel.ts";
export { config, ConfigManager } from "./infra/config.ts";
export { shutdownOTel } from "./infra/logger.ts";
