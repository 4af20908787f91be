// src/container.ts
// Wires config, storage and the outside-world clients into the service graph

import type { Store } from './db/store';
import type { AppConfig } from './middleware/validateEnv';
import { AccountLinking, AuthorizationCodeClient } from './services/accountLinking';
import { ChatCompletionsApi, ContentGenerator } from './services/contentGenerator';
import { Dispatcher } from './services/dispatcher';
import { EngagementService } from './services/engagement';
import type { EventSink } from './services/events';
import { IdTokenVerifier, SchedulerAuthenticator } from './services/identity';
import type { Messenger } from './services/telegram';
import { TriggerRouter } from './services/triggerRouter';
import { UpdateHandler } from './services/updateHandler';
import type { CollectionSource } from './services/whoop/client';
import { HealthSync } from './services/whoop/healthSync';
import { TokenRefresher, TokenVault } from './services/whoop/tokenVault';

export const SCHEDULED_PATHS = ['/morning_motivation', '/scheduled/check-in', '/scheduled/update-health-data'];

export interface ExternalClients {
  store: Store;
  messenger: Messenger;
  completions: ChatCompletionsApi;
  verifier: IdTokenVerifier;
  oauth: AuthorizationCodeClient & TokenRefresher;
  whoop: CollectionSource;
  events: EventSink;
  now?: () => number;
}

export interface Services {
  store: Store;
  vault: TokenVault;
  dispatcher: Dispatcher;
  linking: AccountLinking;
  engagement: EngagementService;
  triggers: TriggerRouter;
}

/**
 * OIDC audiences Cloud Scheduler may mint: the bare service URL or the target URL
 */
export function schedulerAudiences(serviceUrl: string): string[] {
  return [serviceUrl, ...SCHEDULED_PATHS.map((path) => `${serviceUrl}${path}`)];
}

export function createServices(config: AppConfig, clients: ExternalClients): Services {
  const { store, events, now } = clients;
  const clock = now ? { now } : {};

  const vault = new TokenVault(store, clients.oauth, {
    safetyMarginMs: config.budgets.tokenSafetyMarginMs,
    events,
    ...clock,
  });

  const sync = new HealthSync(vault, clients.whoop, store, { events, ...clock });
  const generator = new ContentGenerator(clients.completions, {
    model: config.genai.model,
    timeoutMs: config.genai.timeoutMs,
  });
  const dispatcher = new Dispatcher(store, clients.messenger, { events, ...clock });
  const linking = new AccountLinking(store, clients.oauth, vault, clock);

  const engagement = new EngagementService({
    users: store,
    records: store,
    ledger: store,
    chats: store,
    links: vault,
    sync,
    generator,
    dispatcher,
    ...clock,
  });

  const updates = new UpdateHandler({
    users: store,
    linking,
    engagement,
    dispatcher,
    events,
    ...clock,
  });

  const authenticator = new SchedulerAuthenticator(clients.verifier, {
    audiences: schedulerAudiences(config.serviceUrl),
    ...(config.scheduler.serviceAccount ? { allowedEmail: config.scheduler.serviceAccount } : {}),
  });

  const triggers = new TriggerRouter(
    {
      authenticator,
      ...(config.telegram.webhookSecret ? { webhookSecret: config.telegram.webhookSecret } : {}),
      users: store,
      tokens: store,
      engagement,
      updates,
      events,
    },
    {
      requestBudgetMs: config.budgets.requestMs,
      webhookBudgetMs: config.budgets.webhookMs,
      bucketMinutes: config.scheduler.bucketMinutes,
      ...clock,
    }
  );

  return { store, vault, dispatcher, linking, engagement, triggers };
}
