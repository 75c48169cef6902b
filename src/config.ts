// src/config.ts
export interface EngineConfig {
  /** Cells allocated before the program starts. */
  initialTapeSize: number;
  /** Cells appended each time the data pointer runs off the end. */
  growthIncrement: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  initialTapeSize: 1024,
  growthIncrement: 128,
});

const requirePositive = (name: keyof EngineConfig, value: number): number => {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
};

export const resolveEngineConfig = (config: Partial<EngineConfig> = {}): EngineConfig => ({
  initialTapeSize: requirePositive(
    'initialTapeSize',
    config.initialTapeSize ?? DEFAULT_ENGINE_CONFIG.initialTapeSize,
  ),
  growthIncrement: requirePositive(
    'growthIncrement',
    config.growthIncrement ?? DEFAULT_ENGINE_CONFIG.growthIncrement,
  ),
});
