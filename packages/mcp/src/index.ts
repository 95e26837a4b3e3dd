#!/usr/bin/env tsx
// Bandstamp MCP Server
// Exposes record fusion, manifest checks and chain verification as MCP tools.
//
// Tools:
//   align_record      — fuse observations into a stamped record
//   validate_manifest — structural checks on the effective manifest
//   band_card         — compact band table for the effective manifest
//   verify_chain      — re-check digests and prev links of JSONL records

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  alignRecord,
  alignRecordInput,
  bandCard,
  manifestInput,
  validateManifestTool,
  verifyChainInput,
  verifyChainTool,
} from './tools.js';

// ── Server ────────────────────────────────────────────────────────────────────

const server = new McpServer(
  { name: 'bandstamp', version: '0.1.0' },
  { capabilities: { tools: {} } },
);

server.registerTool(
  'align_record',
  {
    title: 'Build Aligned Record',
    description:
      'Fuse raw alignment observations into one bounded score, classify it against the manifest bands, ' +
      'and return a stamped record. Pass the returned digest as prev to chain the next record.',
    inputSchema: alignRecordInput,
  },
  async (args) => alignRecord(args),
);

server.registerTool(
  'validate_manifest',
  {
    title: 'Validate Manifest',
    description: 'Report overlaps, gaps, ordering and coverage problems in a band manifest.',
    inputSchema: manifestInput,
  },
  async (args) => validateManifestTool(args),
);

server.registerTool(
  'band_card',
  {
    title: 'Band Card',
    description: 'Show the effective manifest id, epsilons and band intervals.',
    inputSchema: manifestInput,
  },
  async (args) => bandCard(args),
);

server.registerTool(
  'verify_chain',
  {
    title: 'Verify Record Chain',
    description:
      'Check stamp grammar, content digests, bands and prev links for records given as JSONL.',
    inputSchema: verifyChainInput,
  },
  async (args) => verifyChainTool(args),
);

// ── Start ─────────────────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
console.error('[mcp] bandstamp server ready on stdio');
