#!/usr/bin/env node
/**
 * web-viewer-server CLI - host the web viewer locally
 */

import { Command } from 'commander';
import { VERSION } from '../src/version.js';
import { serveCommand } from './serve.js';

const program = new Command();

program
  .name('web-viewer-server')
  .description('Serve the web viewer (HTML, JavaScript and Wasm) over HTTP so it can be opened in a browser.')
  .version(VERSION);

program
  .command('serve', { isDefault: true })
  .description('Start a local web server for the web viewer')
  .option('-p, --port <port>', 'Port to listen on, 0 for any free port (default: 9090)')
  .option('--host <host>', 'Interface to bind (default: all interfaces)')
  .option('-d, --assets-dir <dir>', 'Directory holding the built viewer assets (default: ./web_viewer)')
  .option('--port-attempts <n>', 'Try up to n consecutive ports when the port is busy')
  .option('--grace <ms>', 'How long to wait for open connections on shutdown (default: 5000)')
  .option('-q, --quiet', 'Only output the URL')
  .addHelpText('after', `
Environment:
  WEB_VIEWER_PORT, WEB_VIEWER_HOST, WEB_VIEWER_ASSETS_DIR and WEB_VIEWER_GRACE_MS
  are used when the matching flag is not given.

Examples:
  $ web-viewer-server serve
  $ web-viewer-server serve -p 0 -q
  $ web-viewer-server serve -d ./build/web_viewer --port-attempts 10`)
  .action(serveCommand);

program.parseAsync().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
