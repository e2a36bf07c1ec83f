/**
 * Docking Constants
 */

import type { DockingSettings } from '../types';

/** Absorbs floating-point noise in every docking filter comparison. */
export const DOCKING_EPSILON = 1e-10;

export const DOCKING_ANGULAR_THRESHOLD_DEG = 20;

export const DEFAULT_DOCKING_SETTINGS: DockingSettings = {
    angularThresholdCos: Math.cos((DOCKING_ANGULAR_THRESHOLD_DEG * Math.PI) / 180),
    distanceThreshold: 10,
};

export function resolveDockingSettings(overrides: Partial<DockingSettings> = {}): DockingSettings {
    return {
        angularThresholdCos: overrides.angularThresholdCos ?? DEFAULT_DOCKING_SETTINGS.angularThresholdCos,
        distanceThreshold: Math.max(
            overrides.distanceThreshold ?? DEFAULT_DOCKING_SETTINGS.distanceThreshold,
            0
        ),
    };
}
