#!/usr/bin/env -S node --import tsx
import { createWorkflowService } from '../schemas/setup.js';
import { createCli } from './index.js';

const cli = createCli({ service: createWorkflowService() });

try {
  await cli.parseAsync(process.argv);
} catch {
  // createCli has already written the message to stderr.
  process.exitCode = 1;
}
