import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import {
  type LoggingMessageNotification,
  LoggingMessageNotificationSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { afterEach, describe, expect, test } from 'vitest';

import { makeServices } from '../../tools/__tests__/fake-services.js';
import { logger } from '../../utils/logger.js';
import { buildServer } from '../mcp.js';

type LogParams = LoggingMessageNotification['params'];

async function connect() {
  const server = buildServer({ name: 'test-server', version: '0.0.0', services: makeServices() });
  const client = new Client({ name: 'test-client', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);
  return client;
}

function firstMessageFrom(client: Client, loggerName: string): Promise<LogParams> {
  return new Promise((resolve) => {
    client.setNotificationHandler(LoggingMessageNotificationSchema, (notification) => {
      if (notification.params.logger === loggerName) {
        resolve(notification.params);
      }
    });
  });
}

afterEach(() => {
  logger.setLevel('info');
  logger.setSink((line) => console.log(line));
});

describe('buildServer logging', () => {
  test('sends log lines to the session after setLevel', async () => {
    const client = await connect();
    const received = firstMessageFrom(client, 'session_test');

    await client.setLoggingLevel('debug');
    logger.debug('session_test', { message: 'hello' });

    expect(await received).toEqual({
      level: 'debug',
      logger: 'session_test',
      data: { message: 'hello' },
    });
    await client.close();
  });

  test('honours the requested level', async () => {
    const client = await connect();
    const received = firstMessageFrom(client, 'level_test');

    await client.setLoggingLevel('error');
    logger.info('level_test', 'quiet');
    logger.error('level_test', 'loud');

    expect(await received).toEqual({ level: 'error', logger: 'level_test', data: 'loud' });
    await client.close();
  });

  test('stops forwarding once the session closes', async () => {
    const client = await connect();
    await client.close();

    const lines: string[] = [];
    logger.setSink((line) => lines.push(line));
    logger.info('closed_test', 'after close');
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(lines).toHaveLength(1);
    expect(lines[0]?.endsWith('INFO closed_test: after close')).toBe(true);
  });
});
