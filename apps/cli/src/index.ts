#!/usr/bin/env node

import chalk from 'chalk';
import { LifecycleManager, createBackend } from '@tasklet/core';
import { getConfigFilePath, readBootstrapConfig } from './config-file.js';
import { createProgram } from './program.js';
import * as out from './output.js';
import { $try } from './helpers.js';

$try(() => {
  // The bootstrap file picks the backend; everything else lives in the store
  const configPath = getConfigFilePath();
  const bootstrap = readBootstrapConfig(configPath);
  const store = createBackend({ type: bootstrap.storageType, path: bootstrap.storagePath ?? undefined });

  try {
    const manager = new LifecycleManager(store);
    manager.ensureDefaultCategories();

    const purged = manager.purgeExpired();
    if (purged > 0) out.info(chalk.dim(`Purged ${purged} expired deleted task(s)`));

    createProgram({ store, manager, configPath }).parse();
  } finally {
    store.close();
  }
});
