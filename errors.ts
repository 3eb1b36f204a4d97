/**
 * Base class for every fault raised by the simulation core.
 */
export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A division in a bandwidth, latency or efficiency computation hit zero.
 */
export class ArithmeticFault extends SimulationError {}

/**
 * The configuration or scenario script cannot describe a valid run.
 */
export class ConfigurationError extends SimulationError {}
