#!/usr/bin/env node

import { createActions } from './actions';
import { createProgram } from './program';
import { CliUtils } from './utils';

createProgram(createActions())
  .parseAsync(process.argv)
  .catch((error: unknown) => CliUtils.handleError('commitgen', error));
