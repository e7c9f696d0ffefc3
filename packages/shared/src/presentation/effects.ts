import type { LandmarkType } from '../landmarks/types';

export type MapMode = 'normal' | 'temple' | 'man' | 'emergency' | 'service' | 'landmark';

export interface VisualEffect {
  type: 'aura' | 'pulse' | 'beacon' | 'glow';
  color: string;
  intensity: 'soft' | 'strong' | 'steady' | 'medium';
  description: string;
}

type NearbyLike = { type: LandmarkType | string };

const MAP_MODES: Record<string, MapMode> = {
  sacred: 'temple',
  center: 'man',
  medical: 'emergency',
  service: 'service',
};

const EFFECTS: Record<string, VisualEffect> = {
  sacred: { type: 'aura', color: 'white', intensity: 'soft', description: 'Sacred space - respectful proximity' },
  center: { type: 'pulse', color: 'orange', intensity: 'strong', description: 'Center of the burn - high energy' },
  medical: { type: 'beacon', color: 'red', intensity: 'steady', description: 'Emergency services nearby' },
  service: { type: 'glow', color: 'blue', intensity: 'medium', description: 'Services available' },
};

/** Map mode from the nearest landmark (list head). */
export const mapMode = (nearby: readonly NearbyLike[]): MapMode => {
  const nearest = nearby[0];
  if (!nearest) return 'normal';
  return MAP_MODES[nearest.type] ?? 'landmark';
};

export const visualEffects = (nearby: readonly NearbyLike[]): VisualEffect[] =>
  nearby.flatMap((landmark) => {
    const effect = EFFECTS[landmark.type];
    return effect ? [{ ...effect }] : [];
  });
