/**
 * CORS plugin for Fastify
 * Lets the dashboard front end call the API from its own origin
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

const parseOrigins = (value: string | undefined): Set<string> =>
  new Set(
    (value ?? '')
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
  );

function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }

    // Match hostnames exactly (avoid `startsWith('http://localhost')` pitfalls)
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

const originRejected = (): Error & { statusCode: number } =>
  Object.assign(new Error('CORS origin not allowed'), { statusCode: 403 });

/**
 * Register CORS plugin with Fastify.
 * Listed origins are always allowed; localhost is also allowed in development.
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = parseOrigins(config.cors.allowedOrigins);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Allow server-to-server or same-origin requests
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(originRejected(), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'accept'],
    exposedHeaders: ['content-length', 'content-disposition'],
  });
}
