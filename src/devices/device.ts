/**
 * A physical device: identity plus mutable configuration.
 */

import type { AxisConfiguration, DeviceConfiguration, DeviceIdentity } from "./types.js";

const IDENTITY_FIELDS = [
  "name",
  "provider",
  "vendorId",
  "productId",
  "buttonCount",
  "hatCount",
  "axisCount",
  "index",
] as const satisfies readonly (keyof DeviceIdentity)[];

export function emptyIdentity(): DeviceIdentity {
  return {
    name: "",
    provider: "",
    vendorId: 0,
    productId: 0,
    buttonCount: 0,
    hatCount: 0,
    axisCount: 0,
    index: 0,
  };
}

export function cloneConfiguration(config: DeviceConfiguration): DeviceConfiguration {
  return {
    axes: new Map([...config.axes].map(([index, axis]) => [index, { ...axis }])),
  };
}

export class Device {
  readonly identity: Readonly<DeviceIdentity>;
  configuration: DeviceConfiguration;
  /** Calibration as reported by the driver, the source for axis reloads */
  private readonly reportedAxes: Map<number, AxisConfiguration>;

  constructor(
    identity: DeviceIdentity = emptyIdentity(),
    reportedAxes: Map<number, AxisConfiguration> = new Map(),
    configuration: DeviceConfiguration = { axes: new Map() },
  ) {
    this.identity = { ...identity };
    this.reportedAxes = new Map([...reportedAxes].map(([i, a]) => [i, { ...a }]));
    this.configuration = cloneConfiguration(configuration);
  }

  isValid(): boolean {
    return this.identity.name.length > 0 && this.identity.provider.length > 0;
  }

  /** Structural identity comparison; configuration is ignored. */
  equals(other: Device | DeviceIdentity): boolean {
    const identity = other instanceof Device ? other.identity : other;
    return IDENTITY_FIELDS.every((field) => this.identity[field] === identity[field]);
  }

  /**
   * Re-derive an axis' calibration from what the driver reports.
   * Axes the driver reports nothing for get the neutral calibration.
   */
  loadAxisFromApi(axisIndex: number): void {
    const reported = this.reportedAxes.get(axisIndex);
    this.configuration.axes.set(
      axisIndex,
      reported ? { ...reported } : { center: 0, range: 1, trigger: false },
    );
  }

  /** A new device sharing identity and reported axes, with its own configuration copy. */
  clone(): Device {
    return new Device(this.identity, this.reportedAxes, this.configuration);
  }

  toString(): string {
    const hex = (n: number) => n.toString(16).padStart(4, "0");
    return `${this.identity.name} [${this.identity.provider} ${hex(this.identity.vendorId)}:${hex(this.identity.productId)}]`;
  }
}
