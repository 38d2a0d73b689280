#!/usr/bin/env node
import { createProgram, readVersion } from './index.js';

await createProgram(readVersion()).parseAsync();
