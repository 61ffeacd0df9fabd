#!/usr/bin/env node

import 'dotenv/config';
import { fileURLToPath } from 'url';
import { loadCloneConfig, type CloneConfig } from './config.js';
import { DatabaseConnection, describeError } from './db-connection.js';
import { DatabaseCloner } from './db-clone.js';

/**
 * Connect both databases and clone source into target. Resolves to the process exit code.
 */
export async function runClone(config: CloneConfig): Promise<number> {
  const source = new DatabaseConnection(config.source);
  const target = new DatabaseConnection(config.target);

  console.log('🚀 MySQL Clone Tool');
  console.log(`📍 Source: ${source.label}`);
  console.log(`📍 Target: ${target.label}`);
  console.log('');

  try {
    const sourceConnected = await source.connect();
    const targetConnected = await target.connect();

    if (!sourceConnected || !targetConnected) {
      console.error('\n❌ Clone aborted: could not connect to both databases');
      return 1;
    }

    const cloner = new DatabaseCloner(source, target, { batchSize: config.batchSize });
    const success = await cloner.cloneDatabase();
    const stats = cloner.getStats();
    const duration = stats.endTime
      ? (stats.endTime.getTime() - stats.startTime.getTime()) / 1000
      : 0;

    console.log('');
    console.log(`📊 Tables cloned: ${stats.tablesCloned}`);
    console.log(`📊 Rows copied: ${stats.rowsCopied}`);
    console.log(`⏱️  Duration: ${duration}s`);

    if (!success) {
      console.error('\n❌ Clone failed');
      return 1;
    }

    console.log('\n✅ Clone finished');
    return 0;
  } finally {
    await source.disconnect();
    await target.disconnect();
  }
}

async function main(): Promise<void> {
  try {
    process.exitCode = await runClone(loadCloneConfig());
  } catch (error) {
    console.error('\n❌ Error:', describeError(error));
    process.exitCode = 1;
  }
}

// Execute if called directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  void main();
}
