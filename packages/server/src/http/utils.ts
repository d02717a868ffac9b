/**
 * Shared HTTP helpers - JSON, PNG and error responses.
 */

import type { ServerResponse } from 'http';
import { PNG_MIME } from '../config.js';

export function sendJson(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

export function sendError(res: ServerResponse, error: string, status = 500): void {
  sendJson(res, { error }, status);
}

export function sendPng(res: ServerResponse, data: Buffer): void {
  res.writeHead(200, {
    'Content-Type': PNG_MIME,
    'Content-Length': data.length,
    'Cache-Control': 'no-store',
  });
  res.end(data);
}
