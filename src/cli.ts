#!/usr/bin/env node

import process from 'process';
import { main } from './core/hook.js';

process.exitCode = main(process.argv.slice(2));
