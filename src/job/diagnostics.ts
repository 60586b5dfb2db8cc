import type { EngineClient, SystemStats } from "../engine/client.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../worker/errors.js";

const GIB = 1024 ** 3;
/** Hosts above this amount of VRAM can keep every model of a workflow resident. */
const HIGH_VRAM_BYTES = 20 * GIB;

export interface DeviceMemory {
  readonly name: string;
  readonly totalBytes: number;
  readonly freeBytes: number;
}

export interface EngineDiagnostics {
  readonly devices: readonly DeviceMemory[];
  readonly highVram: boolean;
}

function toGib(bytes: number): number {
  return Number((bytes / GIB).toFixed(1));
}

export function summariseSystemStats(stats: SystemStats): EngineDiagnostics {
  const devices = stats.devices.map((device, index) => ({
    name: device.name ?? `device-${index}`,
    totalBytes: device.vram_total ?? 0,
    freeBytes: device.vram_free ?? 0,
  }));
  return { devices, highVram: devices.some((device) => device.totalBytes > HIGH_VRAM_BYTES) };
}

/**
 * Logs the engine's devices and memory. Purely informational: a failure is
 * logged and resolves to `null`.
 */
export async function describeEngine(
  client: Pick<EngineClient, "getSystemStats">,
  logger: StructuredLogger,
): Promise<EngineDiagnostics | null> {
  let stats: SystemStats;
  try {
    stats = await client.getSystemStats();
  } catch (error) {
    logger.warn("engine_diagnostics_unavailable", { error: describeError(error) });
    return null;
  }

  const diagnostics = summariseSystemStats(stats);
  for (const device of diagnostics.devices) {
    logger.info("engine_device", {
      name: device.name,
      vram_total_gib: toGib(device.totalBytes),
      vram_free_gib: toGib(device.freeBytes),
      vram_used_gib: toGib(device.totalBytes - device.freeBytes),
    });
  }
  if (diagnostics.highVram) {
    logger.info("engine_high_vram_detected", { threshold_gib: toGib(HIGH_VRAM_BYTES) });
  }
  return diagnostics;
}
