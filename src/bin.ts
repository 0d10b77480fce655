#!/usr/bin/env node
/**
 * Document QA Validation MCP Server - CLI Entry Point
 *
 * Usage:
 *   docqa-validator                     # after npm install -g
 *   node dist/bin.js                    # direct invocation
 *
 * @module bin
 */

import './index.js';
