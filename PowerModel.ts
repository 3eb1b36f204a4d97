import { ActivityClass, NetworkType } from './types';
import type { PowerProfile } from './types';
import { SimulationError } from './errors';

/**
 * Deterministic per-step power draw.
 * The caller adds the returned value to its own accumulator.
 */
export class PowerModel {
    private readonly profile: PowerProfile;

    constructor(profile: PowerProfile) {
        this.profile = profile;
    }

    /**
     * Power drawn by one step of `activity`.
     * @param volumeMB Only read for TRANSMIT; the draw scales linearly with it.
     */
    public charge(activity: ActivityClass, network: NetworkType, volumeMB: number = 0): number {
        switch (activity) {
            case ActivityClass.IDLE:
                return this.profile.idle;
            case ActivityClass.ACTIVE_USE:
                return this.profile.activeUse;
            case ActivityClass.CPU_BURST:
                return this.profile.cpuBurst;
            case ActivityClass.TRANSMIT:
                if (volumeMB < 0 || !Number.isFinite(volumeMB)) {
                    throw new SimulationError(`Transmit volume must be a non-negative number (got ${volumeMB})`);
                }
                return volumeMB * this.profile.transmitPerMB[network];
        }
    }
}
