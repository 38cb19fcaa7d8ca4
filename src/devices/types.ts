/**
 * Device identity and configuration types.
 */

/** Stable descriptors reported by the driver. Compared by value. */
export interface DeviceIdentity {
  /** Driver-reported name: "Wireless Controller" */
  name: string;
  /** Input API the device was enumerated through: "linux", "udev", "xinput" */
  provider: string;
  vendorId: number;
  productId: number;
  buttonCount: number;
  hatCount: number;
  axisCount: number;
  /** Index among devices sharing the same descriptors */
  index: number;
}

/** Calibration for one axis. */
export interface AxisConfiguration {
  /** Resting position, -1..1 */
  center: number;
  /** Travel from center, 1 = full */
  range: number;
  /** Axis rests at an extreme and travels one way (e.g. analog triggers) */
  trigger: boolean;
}

/** Learned or derived state that is not part of identity. */
export interface DeviceConfiguration {
  /** Axis index → calibration */
  axes: Map<number, AxisConfiguration>;
}

/** Raw hardware descriptor accepted by the registry. */
export interface DeviceDescriptor extends DeviceIdentity {
  /** Driver-reported calibration, keyed by axis index */
  axes?: ({ index: number } & AxisConfiguration)[];
}
