#!/usr/bin/env node

import { main } from './main.js';

// Configuration comes from the environment only; argv is ignored.
main().then((status) => {
  process.exitCode = status;
}, console.error);
