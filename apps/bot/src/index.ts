/**
 * @fileoverview Bot entry point. A missing token or a failed startup is logged as
 * fatal and the process exits with code 1.
 *
 * @module index
 */

import { bootstrap } from './bootstrap.js';

void bootstrap(process.env);
