import {
  getBooleanEnv,
  getEnv,
  getNumberEnv,
  getOptionalEnv,
  getRangedNumberEnv,
  loadServiceRuntimeConfig,
  type ServiceRuntimeConfig
} from "@armguard/shared";

export type FrameSourceKind = "directory" | "snapshot";

export interface DetectionServiceConfig {
  runtime: ServiceRuntimeConfig;
  frameSource: FrameSourceKind;
  frameDirectory: string;
  frameLoop: boolean;
  frameIntervalMs: number;
  snapshotUrl?: string;
  snapshotUsername?: string;
  snapshotPassword?: string;
  detectorUrl: string;
  detectionConfidence: number;
  alertCooldownSec: number;
  screenshotDir: string;
  soundFile?: string;
  soundPlayer?: string;
  throughputEvery: number;
  maxSourceErrors: number;
  sourceRetryMs: number;
  channelCapacity: number;
  autoStart: boolean;
}

function parseFrameSourceKind(raw: string): FrameSourceKind {
  const normalized = raw.trim().toLowerCase();
  if (normalized === "directory" || normalized === "snapshot") {
    return normalized;
  }
  throw new Error(`Unsupported FRAME_SOURCE: ${raw}`);
}

export function loadDetectionServiceConfig(): DetectionServiceConfig {
  const runtime = loadServiceRuntimeConfig("detection-service", 3020);
  const frameSource = parseFrameSourceKind(getEnv("FRAME_SOURCE", "directory"));
  const snapshotUrl = getOptionalEnv("SNAPSHOT_URL");
  if (frameSource === "snapshot" && !snapshotUrl) {
    throw new Error("Missing required environment variable: SNAPSHOT_URL");
  }

  return {
    runtime,
    frameSource,
    frameDirectory: getEnv("FRAME_DIRECTORY", "frames"),
    frameLoop: getBooleanEnv("FRAME_LOOP", false),
    frameIntervalMs: getNumberEnv("FRAME_INTERVAL_MS", 0),
    snapshotUrl,
    snapshotUsername: getOptionalEnv("SNAPSHOT_USERNAME"),
    snapshotPassword: getOptionalEnv("SNAPSHOT_PASSWORD"),
    detectorUrl: getEnv("DETECTOR_URL", "http://localhost:8000"),
    detectionConfidence: getRangedNumberEnv("DETECTION_CONFIDENCE", 0.9, 0, 1),
    alertCooldownSec: getNumberEnv("ALERT_COOLDOWN_SEC", 5),
    screenshotDir: getEnv("ALERT_SCREENSHOT_DIR", "alerts"),
    soundFile: process.env.ALERT_SOUND_FILE === undefined ? "assets/alert.wav" : getOptionalEnv("ALERT_SOUND_FILE"),
    soundPlayer: getOptionalEnv("ALERT_SOUND_PLAYER"),
    throughputEvery: getNumberEnv("PIPELINE_THROUGHPUT_EVERY", 30),
    maxSourceErrors: getNumberEnv("PIPELINE_MAX_SOURCE_ERRORS", 5),
    sourceRetryMs: getNumberEnv("PIPELINE_SOURCE_RETRY_MS", 500),
    channelCapacity: getNumberEnv("PRESENTATION_CHANNEL_CAPACITY", 32),
    autoStart: getBooleanEnv("PIPELINE_AUTO_START", true)
  };
}
