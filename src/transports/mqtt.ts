/**
 * @module transports/mqtt
 * @description ChirpStack v4 integration over MQTT.
 *
 * Uplinks arrive on `application/+/device/+/event/up`; downlinks are
 * published to `application/<appId>/device/<devEui>/command/down`. The
 * application id is learned from the first uplink's `deviceInfo` (or its
 * topic) and falls back to the configured one.
 *
 * The bridge talks to the broker through {@link MqttSession}, a narrow
 * wrapper around the `mqtt` client, so tests can drive it in-process.
 */

import { connect } from "mqtt";
import type { IClientOptions } from "mqtt";
import { DownlinkError } from "../interfaces/downlink.js";
import type { IDownlinkTransport } from "../interfaces/downlink.js";
import type { IUplinkSource } from "../interfaces/uplink.js";
import type { DeviceEui, EpochSeconds } from "../types/branded.js";
import { nowSeconds } from "../types/branded.js";
import {
  UPLINK_TOPIC,
  applicationIdFromTopic,
  downlinkTopic,
  encodeDownlinkEnvelope,
} from "../codec/downlink.js";
import { UplinkError, normalizeUplink, parseUplinkMessage } from "../codec/uplink.js";
import type { UplinkReport } from "../codec/uplink.js";
import { componentLogger } from "../config/logger.js";
import type { Logger } from "../config/logger.js";

// ─── Session ────────────────────────────────────────────────────────

/**
 * The slice of an MQTT client the bridge needs.
 */
export interface MqttSession {
  readonly connected: boolean;
  subscribe(topic: string): Promise<void>;
  publish(topic: string, message: string): Promise<void>;
  onMessage(handler: (topic: string, payload: Uint8Array) => void): void;
  end(): Promise<void>;
}

export interface MqttSessionOptions {
  url: string;
  clientId?: string;
  username?: string;
  password?: string;
  logger?: Logger;
}

/**
 * Open a broker connection. The client reconnects and resubscribes on its
 * own; connection changes are logged.
 */
export function connectMqttSession(options: MqttSessionOptions): MqttSession {
  const logger = componentLogger(options.logger, "mqtt");
  const clientOptions: IClientOptions = {
    reconnectPeriod: 5000,
    connectTimeout: 30_000,
    resubscribe: true,
  };
  if (options.clientId !== undefined) clientOptions.clientId = options.clientId;
  if (options.username !== undefined) clientOptions.username = options.username;
  if (options.password !== undefined) clientOptions.password = options.password;

  const client = connect(options.url, clientOptions);
  client.on("connect", () => logger.info({ url: options.url }, "connected to broker"));
  client.on("reconnect", () => logger.warn({ url: options.url }, "reconnecting to broker"));
  client.on("offline", () => logger.warn("broker offline"));
  client.on("error", (err) => logger.error({ err }, "mqtt error"));

  return {
    get connected() {
      return client.connected;
    },
    async subscribe(topic) {
      await client.subscribeAsync(topic, { qos: 0 });
    },
    async publish(topic, message) {
      await client.publishAsync(topic, message, { qos: 0 });
    },
    onMessage(handler) {
      client.on("message", (topic, payload) => handler(topic, payload));
    },
    async end() {
      await client.endAsync();
    },
  };
}

// ─── Bridge ─────────────────────────────────────────────────────────

export interface ChirpStackBridgeConfig {
  /** Default: application/+/device/+/event/up */
  uplinkTopic?: string;
  /** Used for downlinks until an uplink reveals the real one. */
  applicationId?: string;
  clock?: () => EpochSeconds;
  logger?: Logger;
}

export type UplinkHandler = (report: UplinkReport) => void;

export class ChirpStackMqttBridge implements IUplinkSource, IDownlinkTransport {
  private applicationId: string | null;
  private readonly uplinkTopic: string;
  private readonly clock: () => EpochSeconds;
  private readonly logger: Logger;
  private readonly handlers = new Set<UplinkHandler>();
  private started = false;

  constructor(
    private readonly session: MqttSession,
    config: ChirpStackBridgeConfig = {}
  ) {
    this.uplinkTopic = config.uplinkTopic ?? UPLINK_TOPIC;
    this.applicationId = config.applicationId ?? null;
    this.clock = config.clock ?? nowSeconds;
    this.logger = componentLogger(config.logger, "chirpstack");
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  async start(): Promise<void> {
    if (this.started) return;
    this.session.onMessage((topic, payload) => this.handleMessage(topic, payload));
    await this.session.subscribe(this.uplinkTopic);
    this.started = true;
    this.logger.info({ topic: this.uplinkTopic }, "subscribed to uplinks");
  }

  async close(): Promise<void> {
    this.handlers.clear();
    await this.session.end();
  }

  /**
   * Register an uplink handler.
   * @returns Unsubscribe function.
   */
  onUplink(handler: UplinkHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  get currentApplicationId(): string | null {
    return this.applicationId;
  }

  // ─── Inbound ────────────────────────────────────────────────────

  /**
   * Decode one MQTT message and hand it to the uplink handlers. Messages
   * that fail to decode are logged and dropped.
   */
  handleMessage(topic: string, payload: Uint8Array | string): void {
    let report: UplinkReport;
    try {
      report = normalizeUplink(parseUplinkMessage(payload), this.clock());
    } catch (err) {
      if (err instanceof UplinkError) {
        this.logger.warn({ err, topic, code: err.code }, "dropping undecodable uplink");
      } else {
        this.logger.error({ err, topic }, "uplink decoding failed");
      }
      return;
    }

    const applicationId = report.applicationId ?? applicationIdFromTopic(topic);
    if (applicationId !== null && applicationId !== this.applicationId) {
      this.logger.info({ applicationId }, "captured ChirpStack application id");
      this.applicationId = applicationId;
    }

    this.logger.debug(
      { topic, gatewayId: report.gatewayId, observations: report.observations.length },
      "uplink"
    );
    for (const handler of this.handlers) {
      try {
        handler(report);
      } catch (err) {
        this.logger.error({ err, topic }, "uplink handler failed");
      }
    }
  }

  // ─── Outbound ───────────────────────────────────────────────────

  async send(target: DeviceEui, payload: Uint8Array, port: number): Promise<void> {
    if (!this.session.connected) {
      throw new DownlinkError("MQTT broker is not connected", "NOT_CONNECTED");
    }
    if (this.applicationId === null) {
      throw new DownlinkError(
        "ChirpStack application id unknown; no uplink received and none configured",
        "NO_APPLICATION"
      );
    }

    const topic = downlinkTopic(this.applicationId, target);
    const envelope = encodeDownlinkEnvelope(target, payload, port);
    try {
      await this.session.publish(topic, JSON.stringify(envelope));
    } catch (err) {
      throw new DownlinkError(
        `Publish to ${topic} failed: ${err instanceof Error ? err.message : String(err)}`,
        "PUBLISH_FAILED"
      );
    }
  }
}
