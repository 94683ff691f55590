import 'reflect-metadata';
import { INestApplicationContext, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { LedgerModule, LedgerModuleOptions } from './ledger.module';
import { LedgerClient } from './ledger.client';

export interface CreateLedgerClientOptions extends LedgerModuleOptions {
  logLevels?: LogLevel[];
}

export interface LedgerSession {
  client: LedgerClient;
  /** Shuts the context down, releasing the cache backend's connections */
  close(): Promise<void>;
}

const DEFAULT_LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log'];

/**
 * Boots a standalone Nest context (no HTTP server) around the client.
 * Close the context to release the cache backend's connections.
 */
export async function createLedgerContext(
  options: CreateLedgerClientOptions = {},
): Promise<INestApplicationContext> {
  const { logLevels = DEFAULT_LOG_LEVELS, ...moduleOptions } = options;
  return NestFactory.createApplicationContext(LedgerModule.forRoot(moduleOptions), {
    logger: logLevels,
  });
}

export async function createLedgerClient(
  options: CreateLedgerClientOptions = {},
): Promise<LedgerSession> {
  const context = await createLedgerContext(options);
  return {
    client: context.get(LedgerClient),
    close: () => context.close(),
  };
}
