/**
 * outcome-loop entry point.
 */

import { createProgram } from './index.js';
import { reportError } from './pipeline.js';

createProgram()
  .parseAsync(process.argv)
  .catch(reportError);
