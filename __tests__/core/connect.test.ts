import { describe, it, expect } from 'vitest';
import { connectWithRetry } from '../../src/core/transport/connect';
import type { ConnectOutcome, TransportDriver } from '../../src/core/transport/Transport';
import { ConnectionError, RelayError } from '../../src/core/types/Errors';
import { SilentLogger } from '../../src/core/types/Logger';
import { MemoryBroker } from '../../src/transports/memory/MemoryBroker';
import { MemoryConnection, MemoryDriver } from '../../src/transports/memory/MemoryTransport';

class ScriptedDriver implements TransportDriver {
  readonly backend = 'memory';
  readonly reconnect = { attempts: 3, delayMs: 1 };
  calls = 0;

  constructor(private readonly script: Array<() => ConnectOutcome>) {}

  describe(): string {
    return 'scripted://test';
  }

  async connect(): Promise<ConnectOutcome> {
    const next = this.script[Math.min(this.calls, this.script.length - 1)];
    this.calls++;
    return next();
  }
}

describe('connectWithRetry', () => {
  const logger = new SilentLogger();
  const transient = (): ConnectOutcome => ({
    status: 'transient',
    error: ConnectionError.failed('ECONNREFUSED'),
  });

  it('should return the connection once the driver connects', async () => {
    const broker = new MemoryBroker();
    const driver = new ScriptedDriver([
      transient,
      () => ({ status: 'connected', connection: new MemoryConnection(broker) }),
    ]);

    const connection = await connectWithRetry(driver, logger);

    expect(connection.isOpen()).toBe(true);
    expect(driver.calls).toBe(2);
    await connection.close();
  });

  it('should surface a fatal outcome without retrying', async () => {
    const fatal = ConnectionError.auth('ACCESS_REFUSED - Login was refused');
    const driver = new ScriptedDriver([() => ({ status: 'fatal', error: fatal })]);

    await expect(connectWithRetry(driver, logger)).rejects.toBe(fatal);
    expect(driver.calls).toBe(1);
  });

  it('should fail with retriesExhausted after the last attempt', async () => {
    const driver = new ScriptedDriver([transient]);

    const failure = connectWithRetry(driver, logger);

    await expect(failure).rejects.toBeInstanceOf(ConnectionError);
    await expect(failure).rejects.toMatchObject({
      code: 'CONNECTION_ERROR:RETRIES_EXHAUSTED',
      message: 'Could not connect to scripted://test',
    });
    expect(driver.calls).toBe(3);
  });

  it('should report a paused memory broker as retries exhausted', async () => {
    const broker = new MemoryBroker();
    broker.pause();

    const driver = new MemoryDriver(broker, { reconnect: { attempts: 2, delayMs: 1 } });

    const error = await connectWithRetry(driver, logger).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RelayError);
    expect(error).toMatchObject({ code: 'CONNECTION_ERROR:RETRIES_EXHAUSTED' });
  });
});
