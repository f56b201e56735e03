/**
 * @module config/settings
 * @description Runtime configuration.
 *
 * Read from a JSON file (`config/settings.json` unless `SAFE_ZONE_CONFIG`
 * or an explicit path says otherwise) and validated with zod. Every field
 * has a default, so an empty object is a complete configuration. A file
 * that is missing, unreadable or invalid is reported and replaced by the
 * defaults as a whole.
 *
 * Environment overrides:
 * - `MQTT_BROKER`: broker host (or a full URL when it contains "://")
 * - `LOG_LEVEL`: pino level
 * - `SAFE_ZONE_CONFIG`: settings file path
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { UPLINK_TOPIC } from "../codec/downlink.js";
import type { Logger } from "./logger.js";

export const DEFAULT_SETTINGS_PATH = "config/settings.json";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const HexEui = z.string().regex(/^[0-9a-fA-F]{16}$/, "expected a 16-digit hex DevEUI");

// ─── Schema ─────────────────────────────────────────────────────────

export const SettingsSchema = z.object({
  mqtt: z
    .object({
      url: z.string().min(1).default("mqtt://127.0.0.1:1883"),
      uplinkTopic: z.string().min(1).default(UPLINK_TOPIC),
      clientId: z.string().min(1).optional(),
      username: z.string().optional(),
      password: z.string().optional(),
      /** Fallback for downlink topics until an uplink reveals the real id. */
      applicationId: z.string().min(1).optional(),
    })
    .default({}),
  alarm: z
    .object({
      targetDevice: HexEui.default("70b3d5a4d31205ce"),
      fPort: z.number().int().min(1).max(223).default(10),
      commandDelaySeconds: z.number().nonnegative().default(2),
      volumeLevel: z.number().int().min(0).max(4).default(4),
      durationUnits: z.number().int().min(0).max(255).default(6),
      beaconMajor: z.string().regex(/^[0-9a-fA-F]{4}$/).optional(),
      /** Log downlinks instead of publishing them. */
      dryRun: z.boolean().default(false),
    })
    .default({}),
  policy: z
    .object({
      safeRssiThreshold: z.number().default(-70),
      rssiDirection: z.enum(["HIGHER_IS_SAFER", "LOWER_IS_SAFER"]).default("HIGHER_IS_SAFER"),
      debounceSeconds: z.number().nonnegative().default(5),
      maxSilenceSeconds: z.number().positive().default(120),
      topologyAware: z.boolean().default(false),
    })
    .default({}),
  watchdog: z
    .object({
      intervalSeconds: z.number().positive().default(5),
    })
    .default({}),
  display: z
    .object({
      /** Full status refresh period; 0 disables it. */
      refreshSeconds: z.number().nonnegative().default(5),
    })
    .default({}),
  watchlist: z
    .object({
      file: z.string().min(1).default("config/watchlist.json"),
      autoDiscover: z.boolean().default(false),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default("info"),
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

/**
 * Validate an in-memory settings object (e.g. from tests or embedding
 * code). Throws a ZodError on invalid input.
 */
export function parseSettings(input: SettingsInput): Settings {
  return SettingsSchema.parse(input);
}

// ─── Loading ────────────────────────────────────────────────────────

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Load settings from disk and apply environment overrides.
 *
 * @param path - Settings file. Default: `SAFE_ZONE_CONFIG` or
 *   `config/settings.json`.
 */
export async function loadSettings(
  path?: string,
  env: Env = process.env,
  logger?: Logger
): Promise<Settings> {
  const file = path ?? env["SAFE_ZONE_CONFIG"] ?? DEFAULT_SETTINGS_PATH;
  const settings = await readSettingsFile(file, logger);
  return applyEnvironment(settings, env, logger);
}

async function readSettingsFile(file: string, logger?: Logger): Promise<Settings> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    logger?.warn({ err, file }, "settings file unreadable; using defaults");
    return defaultSettings();
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    logger?.warn({ err, file }, "settings file is not valid JSON; using defaults");
    return defaultSettings();
  }

  const parsed = SettingsSchema.safeParse(json);
  if (!parsed.success) {
    logger?.warn(
      { file, issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
      "settings file invalid; using defaults"
    );
    return defaultSettings();
  }
  logger?.info({ file }, "settings loaded");
  return parsed.data;
}

export function applyEnvironment(settings: Settings, env: Env, logger?: Logger): Settings {
  let { mqtt, logging } = settings;

  const broker = env["MQTT_BROKER"]?.trim();
  if (broker) {
    mqtt = { ...mqtt, url: withBrokerHost(mqtt.url, broker) };
  }

  const level = env["LOG_LEVEL"]?.trim().toLowerCase();
  if (level) {
    const parsed = z.enum(LOG_LEVELS).safeParse(level);
    if (parsed.success) {
      logging = { level: parsed.data };
    } else {
      logger?.warn({ level }, "ignoring unknown LOG_LEVEL");
    }
  }

  return { ...settings, mqtt, logging };
}

/** Swap the host of a broker URL, keeping its scheme and port. */
export function withBrokerHost(url: string, broker: string): string {
  if (broker.includes("://")) return broker;
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `mqtt://${broker}:1883`;
  }
  return `${parsed.protocol}//${broker}${parsed.port ? `:${parsed.port}` : ""}`;
}
