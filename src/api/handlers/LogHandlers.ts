/**
 * LogHandlers: a browser view of the log file.
 *
 * - GET /logs: the log file as an HTML page
 * - POST /logs/clear: truncate the log file, then back to the viewer
 */

import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import type { FastifyRequest, FastifyReply } from 'fastify';
import * as cheerio from 'cheerio';
import { errorResponse, notFound } from '../errors.js';
import type { ApiError } from '../types.js';

export interface LogHandlerContext {
  /** Log file path; empty when file logging is off */
  logFile: string;
}

const LOG_VIEWER_PAGE = `<!DOCTYPE html>
<html>
<head>
  <title>Log Viewer</title>
  <style>
    body { font-family: monospace; background: #111; color: #eee; padding: 20px; }
    #log { background: #222; border: 1px solid #444; border-radius: 8px; padding: 12px;
      white-space: pre-wrap; overflow-y: auto; max-height: 80vh; font-size: 13px; }
    button { margin-right: 10px; padding: 6px 12px; background: #333; color: #eee;
      border: 1px solid #666; border-radius: 4px; cursor: pointer; }
  </style>
</head>
<body>
  <h2>Log Viewer</h2>
  <div class="button-bar">
    <form method="get" action="/logs" style="display:inline;"><button type="submit">Refresh</button></form>
    <form method="post" action="/logs/clear" style="display:inline;"><button type="submit">Clear Log</button></form>
  </div>
  <div id="log"></div>
  <script>
    const logDiv = document.getElementById('log');
    logDiv.scrollTop = logDiv.scrollHeight;
  </script>
</body>
</html>`;

/**
 * Create log viewer handlers.
 */
export function createLogHandlers(ctx: LogHandlerContext) {
  /**
   * GET /logs
   */
  async function viewLogs(
    _request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<string | ApiError> {
    try {
      let content = 'Log file not found.';
      if (ctx.logFile && existsSync(ctx.logFile)) {
        content = await readFile(ctx.logFile, 'utf-8');
      }
      const $ = cheerio.load(LOG_VIEWER_PAGE);
      $('#log').text(content);
      reply.type('text/html; charset=utf-8');
      return $.html();
    } catch (err) {
      return errorResponse(reply, err);
    }
  }

  /**
   * POST /logs/clear
   */
  async function clearLogs(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<FastifyReply | ApiError> {
    try {
      if (!ctx.logFile) {
        return notFound(reply, 'No log file is configured');
      }
      await writeFile(ctx.logFile, '', 'utf-8');
      request.log.info({ logFile: ctx.logFile }, 'Log file cleared');
      return reply.redirect('/logs', 303);
    } catch (err) {
      return errorResponse(reply, err);
    }
  }

  return {
    viewLogs,
    clearLogs,
  };
}

export type LogHandlers = ReturnType<typeof createLogHandlers>;
