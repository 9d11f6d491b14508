// src/gateway/server.ts
/**
 * Gateway - wires the assistant together and runs its loops
 *
 * Every privileged path (chat commands, auto-pickup, WhatsApp polling)
 * goes through the single AuthorizationEngine built here.
 */

import { createLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import type { Config } from "../config/schema.js";
import { dataPaths, type DataPaths } from "../config/loader.js";
import { ChannelRegistry } from "../channels/registry.js";
import { createTelegramPlugin } from "../channels/telegram/index.js";
import type { ChannelPlugin } from "../channels/interface.js";
import { loadPolicyConfig } from "../policy/loader.js";
import { PermissionPolicy } from "../policy/policy.js";
import { BankingGuard, loadBundledBankingData } from "../policy/banking.js";
import { levelName } from "../policy/types.js";
import { AuditLog } from "../audit/logger.js";
import { AuditRotation } from "../audit/rotation.js";
import { createPinStore, type PinStore } from "../auth/pin-store.js";
import { SessionStore } from "../auth/session-store.js";
import { ConfirmationLedger } from "../gate/confirmations.js";
import { AuthorizationEngine } from "../gate/engine.js";
import { ActionRegistry, ActionRunner } from "../gate/actions.js";
import { registerBuiltinHandlers } from "../gate/handlers.js";
import { Dispatcher } from "../dispatch/dispatcher.js";
import type { BrainCapability, TelephonyPort, VoiceCapability } from "../capabilities/interface.js";
import type { ReaderSet } from "../readers/interface.js";
import { createWorkspaceFiles } from "../readers/workspace-files.js";
import { CallNotesStore } from "../calls/notes.js";
import { ConversationHandler } from "../calls/conversation.js";
import { CallMonitor } from "../calls/monitor.js";
import { ImportanceDetector, loadBundledImportanceData } from "../whatsapp/importance.js";
import { WhatsAppPoller } from "../whatsapp/poller.js";
import { CommandRouter } from "./commands.js";

const log = createLogger("gateway");

const ROTATION_CHECK_MS = 60 * 60 * 1000;

export interface GatewayOptions {
  config: Config;
  /** Phone line; the call monitor runs only when telephony, voice and brain are all present */
  telephony?: TelephonyPort;
  voice?: VoiceCapability;
  brain?: BrainCapability;
  readers?: ReaderSet;
  /** Chat transports; defaults to Telegram when a token is configured */
  channels?: ChannelPlugin[];
  now?: () => number;
}

export interface Assistant {
  paths: DataPaths;
  policy: PermissionPolicy;
  audit: AuditLog;
  rotation: AuditRotation;
  pins: PinStore;
  sessions: SessionStore;
  ledger: ConfirmationLedger;
  dispatcher: Dispatcher;
  engine: AuthorizationEngine;
  registry: ActionRegistry;
  runner: ActionRunner;
  notes: CallNotesStore;
  channels: ChannelRegistry;
  router: CommandRouter;
  monitor?: CallMonitor;
  poller?: WhatsAppPoller;
}

/** System-origin kinds granted without a session, given what is enabled */
export function standingGrantsFor(config: Config): string[] {
  const grants: string[] = [];
  if (config.calls.autoPickupEnabled) grants.push("call_pickup");
  if (config.whatsapp.enabled) grants.push("poll_whatsapp");
  return grants;
}

/**
 * Build every component. Nothing is started: no timers, no transport
 * connections, no telephony subscription.
 */
export async function createAssistant(options: GatewayOptions): Promise<Assistant> {
  const { config } = options;
  const now = options.now ?? Date.now;
  const paths = dataPaths(config);
  const owner = config.owner;

  const guard = new BankingGuard(loadBundledBankingData(), config.policy.bankingBlocklist);
  const policy = new PermissionPolicy(await loadPolicyConfig(paths.policy), guard);

  const audit = new AuditLog({
    logPath: paths.auditLog,
    archiveDir: paths.auditArchiveDir,
    queueLimit: config.audit.queueLimit,
    now,
  });
  const rotation = new AuditRotation({
    logPath: paths.auditLog,
    archiveDir: paths.auditArchiveDir,
    keepDays: config.audit.keepDays,
    maxSizeMb: config.audit.maxSizeMb,
    beforeRotate: () => audit.flush(),
    now,
  });

  const pins = createPinStore({ storePath: paths.pins });
  const sessions = new SessionStore({
    pins,
    sessionTimeoutMs: config.auth.sessionTimeoutSeconds * 1000,
    maxPinRetries: config.auth.maxPinRetries,
    lockoutMs: config.auth.lockoutSeconds * 1000,
    snapshotPath: paths.sessions,
    now,
  });
  await sessions.load();

  const l4DelayMs = config.auth.l4DelaySeconds * 1000;
  const ledger = new ConfirmationLedger({ ttlMs: config.auth.confirmationTtlSeconds * 1000, now });
  const channels = new ChannelRegistry();
  const dispatcher = new Dispatcher({ channels, ledger, l4DelayMs });

  const engine = new AuthorizationEngine({
    policy,
    sessions,
    audit,
    ledger,
    confirmations: dispatcher,
    l4DelayMs,
    standingGrants: standingGrantsFor(config),
    now,
  });

  const notes = new CallNotesStore(paths.callNotes);
  const readers = options.readers ?? {};
  let monitor: CallMonitor | undefined;
  let poller: WhatsAppPoller | undefined;

  const status = (principalId: string): string => {
    const session = sessions.peek(principalId);
    const lines = [
      sessions.isValid(principalId) && session
        ? `Session: ${levelName(sessions.effectiveLevel(principalId))} until ${new Date(session.expiresAt).toISOString()}`
        : "Session: not verified",
      `Calls: ${monitor ? `${monitor.state.status}, auto-pickup ${config.calls.autoPickupEnabled ? "on" : "off"}` : "no telephony"}`,
      `WhatsApp: ${poller ? "polling" : "off"}`,
      `Audit: ${audit.isDegraded() ? "DEGRADED" : "ok"} (${audit.pendingCount()} pending)`,
    ];
    return lines.join("\n");
  };

  const registry = registerBuiltinHandlers(new ActionRegistry(), {
    policy,
    audit,
    notes,
    readers,
    files: createWorkspaceFiles(paths.filesRoot),
    telephony: options.telephony,
    status,
    now,
  });
  const runner = new ActionRunner(engine, registry);

  if (options.telephony && options.voice && options.brain) {
    const conversation = new ConversationHandler({
      voice: options.voice,
      brain: options.brain,
      ownerName: config.calls.ownerName,
      contacts: config.calls.contacts,
      turnTimeoutMs: config.calls.turnTimeoutSeconds * 1000,
      maxSilentTurns: config.calls.maxSilentTurns,
      now,
    });
    monitor = new CallMonitor({
      engine,
      telephony: options.telephony,
      conversation,
      owner,
      autoPickupEnabled: config.calls.autoPickupEnabled,
      autoPickupDelayMs: config.calls.autoPickupDelaySeconds * 1000,
      maxDurationMs: config.calls.maxDurationSeconds * 1000,
      notes,
      notifier: dispatcher,
      now,
    });
  } else {
    log.info("Telephony, voice or brain not provided; call handling disabled");
  }

  if (config.whatsapp.enabled) {
    if (readers.whatsapp) {
      poller = new WhatsAppPoller({
        runner,
        owner,
        notifier: dispatcher,
        guard,
        detector: new ImportanceDetector(loadBundledImportanceData(), config.calls.contacts),
        intervalMs: config.whatsapp.pollIntervalSeconds * 1000,
        now,
      });
    } else {
      log.warn("WhatsApp is enabled but no WhatsApp reader was provided; polling disabled");
    }
  }

  const plugins = options.channels ?? [];
  if (!options.channels) {
    if (config.telegram.token) {
      plugins.push(createTelegramPlugin({ token: config.telegram.token }));
    } else {
      log.warn("No Telegram token configured; chat commands disabled");
    }
  }

  const router = new CommandRouter({
    engine,
    runner,
    dispatcher,
    channels,
    owner,
    allowList: config.telegram.allowList,
    now,
  });
  for (const plugin of plugins) {
    plugin.onMessage(async (ctx) => {
      await router.handle(ctx);
    });
    channels.register(plugin);
  }

  return {
    paths,
    policy,
    audit,
    rotation,
    pins,
    sessions,
    ledger,
    dispatcher,
    engine,
    registry,
    runner,
    notes,
    channels,
    router,
    monitor,
    poller,
  };
}

export async function startGateway(options: GatewayOptions): Promise<() => Promise<void>> {
  const assistant = await createAssistant(options);
  const { audit, rotation, channels, monitor, poller, router, ledger } = assistant;

  await rotation.rotateIfDue().catch((err) => log.error(`Startup rotation check failed: ${errorMessage(err)}`));
  const stopRotation = rotation.schedule(ROTATION_CHECK_MS);
  const pruneTimer = setInterval(() => {
    ledger.prune();
    router.prunePending();
  }, 60_000);
  pruneTimer.unref?.();

  await channels.startAll();
  monitor?.start();
  poller?.start();

  log.info(`Gateway started for ${options.config.owner}`);

  return async () => {
    poller?.stop();
    if (monitor) await monitor.stop();
    router.stop();
    stopRotation();
    clearInterval(pruneTimer);
    await channels.stopAll();
    await audit.close();
    log.info("Gateway stopped");
  };
}
