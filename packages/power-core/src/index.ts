export * from "./errors/errors.js";
export * from "./logging/logger.js";

export * from "./readings/reading.js";
export * from "./stats/statistics.js";

export * from "./timers/timing.js";
export * from "./timers/scheduler.js";

export type { PowerSample, PowerSource, CounterSample, EnergyCounter } from "./sources/PowerSource.js";
export { EnergyCounterAdapter } from "./sources/EnergyCounterAdapter.js";
export type { EnergyCounterAdapterOptions } from "./sources/EnergyCounterAdapter.js";

export { ReadingBuffer } from "./monitor/ReadingBuffer.js";
export * from "./monitor/Monitor.js";
export * from "./collector/Collector.js";

export { raplProbe, DEFAULT_POWERCAP_PATH } from "./sensors/rapl/rapl-probe.js";
export type { RaplPackageInfo, RaplProbeResult, RaplStatus, RaplVendor } from "./sensors/rapl/rapl-probe.js";
export { RaplEnergyCounter, createRaplSources } from "./sensors/rapl/RaplEnergyCounter.js";
export type { RaplSource } from "./sensors/rapl/RaplEnergyCounter.js";

export * from "./sensors/gpu/NvidiaSmiSource.js";
export * from "./sensors/redfish/RedfishPowerSource.js";

export { isRecord, finiteNumberOrUndefined } from "./utils/guards.js";
export { accessReadable, extractErrorCode, reasonFromCode } from "./utils/file-utils.js";
export type { AccessResult } from "./utils/file-utils.js";
