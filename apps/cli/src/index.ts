#!/usr/bin/env tsx

import dotenv from 'dotenv';
import { createDb, loadConfig } from '@duetrack/core';
import { createProgram } from './program.js';

dotenv.config();

// Initialize database
const config = loadConfig();
const db = createDb(config.databasePath);

createProgram(db).parse();
