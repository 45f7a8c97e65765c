#!/usr/bin/env node
/**
 * PDF Structuring Pipeline MCP Server - CLI Entry Point
 *
 * Usage:
 *   pdf-structuring-pipeline            # after npm install -g
 *   node dist/index.js                  # direct invocation
 *
 * @module bin
 */

import './index.js';
