/**
 * TtrssClient - one session against one Tiny Tiny RSS instance
 */

import type { HttpClient } from "./port/http_client.ts";
import type {
  ConnInfo,
  Envelope,
  JsonObject,
  NetworkConfig,
  SubscribeRequest,
} from "./domain/types.ts";
import type { SubscribeResult } from "./domain/subscription.ts";
import type { FeedTreeNode } from "./domain/feed_tree.ts";
import { createSessionState, isLoggedIn } from "./domain/session.ts";
import { FetchHttpClient } from "./gateway/fetch_http_client.ts";
import { TtrssRpcChannel } from "./gateway/ttrss_rpc_channel.ts";
import { LoginUsecase } from "./usecase/login.ts";
import { SubscribeUsecase } from "./usecase/subscribe.ts";
import { GetFeedTreeUsecase } from "./usecase/get_feed_tree.ts";
import { config } from "./infra/config.ts";

export interface TtrssClientOptions {
  httpClient?: HttpClient;
  network?: NetworkConfig;
}

export class TtrssClient {
  private readonly channel: TtrssRpcChannel;
  private readonly loginUsecase: LoginUsecase;
  private readonly subscribeUsecase: SubscribeUsecase;
  private readonly feedTreeUsecase: GetFeedTreeUsecase;

  constructor(options: TtrssClientOptions = {}) {
    const httpClient = options.httpClient ??
      new FetchHttpClient(options.network ?? config.loadConfig().network);
    this.channel = new TtrssRpcChannel(httpClient, createSessionState());
    this.loginUsecase = new LoginUsecase(this.channel);
    this.subscribeUsecase = new SubscribeUsecase(this.channel);
    this.feedTreeUsecase = new GetFeedTreeUsecase(this.channel);
  }

  get endpoint(): string {
    return this.channel.session.endpoint;
  }

  get sessionId(): string {
    return this.channel.session.token;
  }

  get loggedIn(): boolean {
    return isLoggedIn(this.channel.session);
  }

  /** Raw access for operations without a dedicated wrapper. */
  call(operation: string, parameters?: JsonObject): Promise<Envelope> {
    return this.channel.call(operation, parameters);
  }

  /** Without arguments, logs in with TTRSS_URL, TTRSS_USER and TTRSS_PASSWORD. */
  async login(conn?: ConnInfo): Promise<true> {
    return await this.loginUsecase.execute(conn ?? config.getConnInfo());
  }

  subscribe(request: SubscribeRequest): Promise<SubscribeResult> {
    return this.subscribeUsecase.execute(request);
  }

  getFeedTree(includeEmptyCategories = false): Promise<FeedTreeNode> {
    return this.feedTreeUsecase.execute(includeEmptyCategories);
  }
}
