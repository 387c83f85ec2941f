#!/usr/bin/env node

import { createDb, getDefaultDbPath } from '@pledge/core';
import { createContext } from './context.js';
import { createProgram } from './program.js';

// Initialize database ($PLEDGE_DB overrides the platform default)
const db = createDb(getDefaultDbPath());

const program = createProgram(createContext(db));
program.parse();
