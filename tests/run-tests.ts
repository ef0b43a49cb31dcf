import 'tsconfig-paths/register';
import { tests } from './testHarness';
import { logManager } from '../src/shared/logging/logger';
import './architecture/importBoundaries.test';
import './groupIdentity.test';
import './membershipTracker.test';
import './membershipScan.test';
import './heosPlayerDiscovery.test';
import './heosBridgeHandler.test';
import './config.test';
import './logger.test';
import './runtimeShutdown.test';

async function run(): Promise<void> {
  let failures = 0;
  for (const { name, fn } of tests) {
    logManager.configure({ level: 'none' });
    try {
      await fn();
      console.log(`ok - ${name}`);
    } catch (error) {
      failures += 1;
      console.error(`not ok - ${name}`);
      console.error(error);
    }
  }
  if (failures > 0) {
    process.exitCode = 1;
  }
}

void run();
