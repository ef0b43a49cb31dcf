import type { HeosGroup, HeosPlayer } from '@/domain/heos/types';

export type HeosConnectionTarget = {
  host: string;
  port: number;
};

export type HeosFavorite = {
  mid: string;
  name: string;
};

/**
 * Change notifications pushed by the system's event stream.
 */
export type HeosChangeEvent =
  | { type: 'event'; command: 'players_changed' | 'groups_changed' }
  | { type: 'event'; command: 'connection_lost' | 'connection_restored' }
  | { type: 'system'; command: 'sign_in'; result: 'success' | 'fail' }
  | { type: 'system'; command: 'user_changed' };

export type HeosChangeListener = (event: HeosChangeEvent) => void;

/**
 * Client session to the HEOS system. Snapshot fetches resolve `null` while no data
 * can be obtained (e.g. the session is not established).
 */
export interface HeosSystemPort {
  /** `withRecoveryDelay` gives a restarting system time to come back before connecting. */
  establishConnection: (target: HeosConnectionTarget, withRecoveryDelay: boolean) => Promise<boolean>;
  closeConnection: () => Promise<void>;
  fetchPlayers: () => Promise<HeosPlayer[] | null>;
  fetchGroups: () => Promise<HeosGroup[] | null>;
  startEventListener: () => void;
  startHeartbeat: (intervalSeconds: number) => void;
  logIn: (username: string, password: string) => Promise<void>;
  getFavorites: () => Promise<HeosFavorite[]>;
  getPlaylists: () => Promise<string[]>;
  registerForChangeEvents: (listener: HeosChangeListener) => void;
  unregisterForChangeEvents: (listener: HeosChangeListener) => void;
}
