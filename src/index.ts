/**
 * Island Warden — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, wires the flight logger
 *       and the island status monitor, routes interactions.
 * WHY: Central orchestration so startup and the hot paths read in one place.
 * FLOWS:
 *  - Ready: open DB → build registry/dispatcher/executor → resolve islands →
 *           start schedulers (status poll, roster, alert expiry) → sync commands
 *  - First roster load → feed gate opens → held feed lines replay into FlightLogger
 *  - MessageCreate (listen channel): feed line → FeedGate → arrival/departure → FlightLogger
 *  - GuildMemberAdd/Update/Remove: keep the roster's known set current between refreshes
 *  - Interaction: flight buttons/modals, /islands, /flighthistory
 *  - SIGTERM/SIGINT: stop schedulers → destroy client → close DB → flush Sentry
 * DOCS:
 *  - discord.js v14 events: https://discord.js.org/#/docs/discord.js/main/typedef/Events
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ChannelType, Client, Events, GatewayIntentBits, Partials, type Guild, type GuildMember } from "discord.js";
import { env } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { captureException, flushSentry, initializeSentry } from "./lib/sentry.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { titleCase } from "./lib/text.js";
import { syncGuildCommands } from "./lib/commandSync.js";
import { closeDatabase, openDatabase } from "./db/db.js";
import { KnownEntityRegistry } from "./features/flight/registry.js";
import { ActionExecutor } from "./features/flight/executor.js";
import { FlightLogger } from "./features/flight/flightLogger.js";
import { DiscordPlatform } from "./features/flight/discordPlatform.js";
import { parseFeedLine } from "./features/flight/feed.js";
import { FeedGate } from "./features/flight/feedGate.js";
import { rosterKeysFor } from "./features/flight/roster.js";
import {
  flightInteractionBudgetMs,
  handleFlightButton,
  handleFlightModal,
  type FlightInteractionDeps,
} from "./features/flight/interactions.js";
import { NotificationDispatcher } from "./features/notify/dispatcher.js";
import { DiscordChannelSink } from "./features/notify/discordSink.js";
import { StatusTracker } from "./features/islandStatus/tracker.js";
import { DiscordIslandProbe } from "./features/islandStatus/discordProbe.js";
import { loadIslandConfig, resolveIslandChannels } from "./features/islandStatus/islands.js";
import { transitionNotice } from "./features/islandStatus/transitions.js";
import type { MonitoredIsland } from "./features/islandStatus/types.js";
import { StatusPollScheduler } from "./scheduler/islandStatusScheduler.js";
import { startRosterScheduler, stopRosterScheduler } from "./scheduler/rosterScheduler.js";
import { startAlertExpiryScheduler, stopAlertExpiryScheduler } from "./scheduler/alertExpiryScheduler.js";
import * as islandsCommand from "./commands/islands.js";
import * as flightHistoryCommand from "./commands/flighthistory.js";

initializeSentry({
  dsn: env.SENTRY_DSN,
  environment: env.SENTRY_ENVIRONMENT ?? env.NODE_ENV,
  tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
  release: process.env.npm_package_version ?? "dev",
});

// ===== Global Error Handlers =====

const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
});

process.on("uncaughtException", (error, origin) => {
  logger.error({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception");
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry a moment to flush
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent,
    GatewayIntentBits.GuildPresences,
    GatewayIntentBits.DirectMessages,
  ],
  partials: [Partials.Channel],
});

const db = openDatabase(env.DB_PATH);
const registry = new KnownEntityRegistry(db);
const dispatcher = new NotificationDispatcher(new DiscordChannelSink(client), {
  timeoutMs: env.PLATFORM_CALL_TIMEOUT_MS,
});
const tracker = new StatusTracker({ debounceThreshold: env.STATUS_DEBOUNCE_THRESHOLD });
// Feed lines wait here until the first roster load
const feedGate = new FeedGate();

// Filled in on ClientReady; handlers below ignore events until then
let flightDeps: FlightInteractionDeps | null = null;
let monitoredIslands: MonitoredIsland[] = [];
let unresolvedIslands: string[] = [];
let statusScheduler: StatusPollScheduler | null = null;

async function guildTextChannels(guild: Guild): Promise<Array<{ id: string; name: string }>> {
  const channels = await guild.channels.fetch();
  const out: Array<{ id: string; name: string }> = [];
  for (const channel of channels.values()) {
    if (channel && channel.type === ChannelType.GuildText) out.push({ id: channel.id, name: channel.name });
  }
  return out;
}

async function setupIslandMonitor(guild: Guild): Promise<void> {
  const configs = loadIslandConfig(env.ISLANDS_FILE);
  const { islands, unresolved } = resolveIslandChannels(configs, await guildTextChannels(guild));
  if (unresolved.length > 0) {
    logger.warn({ unresolved }, "[islands] no channel found for some islands; they are not monitored");
  }
  monitoredIslands = islands;
  unresolvedIslands = unresolved;

  const probe = new DiscordIslandProbe(guild, {
    botRoleId: env.ISLAND_BOT_ROLE_ID,
    botNamePrefix: env.ISLAND_BOT_NAME_PREFIX,
    hostName: env.ISLAND_HOST_NAME,
  });

  statusScheduler = new StatusPollScheduler(islands, probe, tracker, {
    intervalMs: env.STATUS_POLL_INTERVAL_SECONDS * 1000,
    concurrency: env.STATUS_PROBE_CONCURRENCY,
    probeTimeoutMs: env.STATUS_PROBE_TIMEOUT_MS,
    onTransition: async (event, island) => {
      const notice = transitionNotice(event, island);
      if (notice) await dispatcher.notify(island.channelId, notice);
    },
  });
  statusScheduler.start();
  logger.info({ islands: islands.length }, "[islands] status monitor started");
}

function setupFlightLogger(guild: Guild): FlightLogger {
  const platform = new DiscordPlatform(guild, { accessRoleId: env.ISLAND_ACCESS_ROLE_ID });
  const executor = new ActionExecutor(registry, platform, dispatcher, {
    modLogChannel: env.MOD_LOG_CHANNEL_ID,
    callTimeoutMs: env.PLATFORM_CALL_TIMEOUT_MS,
  });

  const flightLogger = new FlightLogger(registry, executor, dispatcher, {
    alertChannel: env.FLIGHT_ALERT_CHANNEL_ID,
    alertTtlSeconds: env.FLIGHT_ALERT_TTL_MINUTES * 60,
    islandLabel: (islandKey) => {
      const island = monitoredIslands.find((i) => i.key === islandKey);
      return island ? `<#${island.channelId}>` : titleCase(islandKey);
    },
  });
  flightDeps = { flightLogger, registry };

  startAlertExpiryScheduler(flightLogger, env.FLIGHT_ALERT_TTL_MINUTES);
  return flightLogger;
}

function startRoster(guild: Guild, flightLogger: FlightLogger): void {
  const rosterSource = async () => {
    const members = await guild.members.fetch();
    return members.map((m) => ({ id: m.id, displayName: m.displayName }));
  };
  startRosterScheduler(rosterSource, registry, { intervalMinutes: env.ROSTER_REFRESH_MINUTES })
    .then(() =>
      feedGate.open(async (e) => {
        if (e.kind === "arrival") {
          await flightLogger.handleArrival(e.event);
        } else {
          await flightLogger.handleDeparture(e.event);
        }
      })
    )
    .catch((err) => {
      logger.error({ err }, "[startup] feed gate failed to open");
      captureException(err, { context: "feedGate" });
    });
}

// ===== Ready =====

client.once(
  Events.ClientReady,
  wrapEvent(
    "ready",
    async () => {
      logger.info({ tag: client.user?.tag, id: client.user?.id }, "[startup] logged in");
      const guild = await client.guilds.fetch(env.GUILD_ID);

      const flightLogger = setupFlightLogger(guild);
      startRoster(guild, flightLogger);
      await setupIslandMonitor(guild);

      await syncGuildCommands({ token: env.DISCORD_TOKEN, appId: env.CLIENT_ID, guildId: env.GUILD_ID });
      logger.info("[startup] ready");
    },
    120_000
  )
);

// ===== Flight feed =====

client.on(
  Events.MessageCreate,
  wrapEvent("messageCreate", async (message) => {
    if (message.channelId !== env.FLIGHT_LISTEN_CHANNEL_ID) return;

    const parsed = parseFeedLine(message.content, Math.floor(message.createdTimestamp / 1000));
    if (parsed) await feedGate.push(parsed);
  })
);

// ===== Member changes =====

function syncRosterMember(member: GuildMember): void {
  if (member.guild.id !== env.GUILD_ID) return;
  registry.syncMember(member.id, rosterKeysFor(member.displayName));
}

client.on(
  Events.GuildMemberAdd,
  wrapEvent("guildMemberAdd", async (member) => syncRosterMember(member))
);

client.on(
  Events.GuildMemberUpdate,
  wrapEvent("guildMemberUpdate", async (_oldMember, newMember) => syncRosterMember(newMember))
);

client.on(
  Events.GuildMemberRemove,
  wrapEvent("guildMemberRemove", async (member) => {
    if (member.guild.id === env.GUILD_ID) registry.dropMember(member.id);
  })
);

// ===== Interactions =====

client.on(
  Events.InteractionCreate,
  wrapEvent("interactionCreate", async (interaction) => {
    if (interaction.isButton()) {
      if (flightDeps) await handleFlightButton(interaction, flightDeps);
      return;
    }
    if (interaction.isModalSubmit()) {
      if (flightDeps) await handleFlightModal(interaction, flightDeps);
      return;
    }
    if (!interaction.isChatInputCommand()) return;

    switch (interaction.commandName) {
      case "islands":
        await islandsCommand.execute(interaction, { islands: monitoredIslands, unresolved: unresolvedIslands, tracker });
        return;
      case "flighthistory":
        await flightHistoryCommand.execute(interaction, { registry });
        return;
      default:
        logger.debug({ command: interaction.commandName }, "[interaction] unknown command");
    }
  }, flightInteractionBudgetMs(env.PLATFORM_CALL_TIMEOUT_MS))
);

// ===== Coordinated Graceful Shutdown =====

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  try {
    statusScheduler?.stop();
    stopRosterScheduler();
    stopAlertExpiryScheduler();

    client.removeAllListeners();
    await client.destroy();

    try {
      closeDatabase(db);
    } catch (err) {
      logger.warn({ err }, "[shutdown] Database close failed (non-fatal)");
    }

    await flushSentry();
    logger.info("[shutdown] Graceful shutdown complete");
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "[shutdown] Error during graceful shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

client.login(env.DISCORD_TOKEN).catch((err) => {
  logger.error({ err }, "Fatal startup error");
  process.exit(1);
});
