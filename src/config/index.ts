import { loadEnvironment } from '@/config/environment';
import { DISCOVERY_TIMING } from '@/config/discovery';
import { parseBridgeConfig } from '@/config/heos';

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 */
export const loadConfig = (bridge: Record<string, unknown>) => {
  const env = loadEnvironment();
  return {
    env,
    bridge: parseBridgeConfig(bridge),
    discovery: { ...DISCOVERY_TIMING },
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;
