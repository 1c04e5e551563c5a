import { describe, expect, it, vi } from 'vitest';
import {
  InitiatorController,
  benchmarkTimeoutMs,
  parseDeviceList,
} from '../../src/controllers/initiator.controller';
import { StateError } from '../../src/lib/errors';
import type { RemoteCommand } from '../../src/services/remote-command';
import { connectionConfig, targetConfig } from '../../src/types/nvmeof/config';
import type { BenchmarkSpec } from '../../src/types/report';
import { FakeSession, fail, ok, type Responder } from '../helpers/fake-session';

const NQN = 'nqn.test:unit1';

const target = targetConfig({
  connection: connectionConfig({ host: 'target.lab', username: 'root', password: 'test-secret' }),
  dataIp: '192.168.1.49',
  subsystemNqn: NQN,
});
const initiatorConfig = {
  connection: connectionConfig({ host: 'initiator.lab', username: 'root', password: 'test-secret' }),
};

const DISCOVERY_LOG = `Discovery Log Number of Records 1, Generation counter 2
=====Discovery Log Entry 0======
trtype:  tcp
adrfam:  ipv4
subtype: nvme subsystem
subnqn:  ${NQN}
traddr:  192.168.1.49
`;

const FIO_JSON = JSON.stringify({
  jobs: [{ jobname: 'rand_read', read: { io_bytes: 4096, bw: 2048, iops: 512 } }],
});

/** Fabric devices appear only after a successful nvme connect. */
function fabric(overrides: Responder = () => undefined): Responder {
  let connected = false;
  return (request: RemoteCommand) => {
    const override = overrides(request);
    if (override) return override;
    if (request.kind === 'nvmeConnect') connected = true;
    if (request.kind === 'nvmeListFabricDevices') return ok(connected ? '/dev/nvme1n1\n' : '');
    return undefined;
  };
}

function controller(session: FakeSession) {
  const sleep = vi.fn(async (_ms: number) => undefined);
  const initiator = new InitiatorController(initiatorConfig, target, session, { settleMs: 1500, sleep });
  return { initiator, sleep };
}

async function connected(responder: Responder = fabric()) {
  const session = new FakeSession('initiator', responder);
  const { initiator } = controller(session);
  await expect(initiator.connect()).resolves.toBe(true);
  return { session, initiator };
}

describe('parseDeviceList', () => {
  it('takes the first column of each non-empty line', () => {
    expect(parseDeviceList('/dev/nvme1n1\n\n  /dev/nvme2n1  extra\n')).toEqual(['/dev/nvme1n1', '/dev/nvme2n1']);
    expect(parseDeviceList('')).toEqual([]);
  });
});

describe('benchmarkTimeoutMs', () => {
  it('allows a minute past a time-bounded run', () => {
    expect(benchmarkTimeoutMs(60)).toBe(120_000);
  });

  it('falls back to the default command timeout', () => {
    expect(benchmarkTimeoutMs()).toBe(300_000);
  });
});

describe('InitiatorController.discover', () => {
  it('succeeds when the discovery log lists the subsystem', async () => {
    const session = new FakeSession('initiator', (request) =>
      request.kind === 'nvmeDiscover' ? ok(DISCOVERY_LOG) : undefined
    );
    const { initiator } = controller(session);

    await expect(initiator.discover()).resolves.toBe(true);

    expect(session.connectCalls).toBe(1);
    expect(session.commands()).toEqual(['nvme discover -t tcp -a 192.168.1.49 -s 4420']);
  });

  it('fails when the command succeeds but the subsystem is not listed', async () => {
    const session = new FakeSession('initiator', (request) =>
      request.kind === 'nvmeDiscover' ? ok('Discovery Log Number of Records 0\n') : undefined
    );
    await expect(controller(session).initiator.discover()).resolves.toBe(false);
  });

  it('fails when the command fails even if the output names the subsystem', async () => {
    const session = new FakeSession('initiator', (request) =>
      request.kind === 'nvmeDiscover' ? { stdout: DISCOVERY_LOG, stderr: '', exitCode: 1, success: false } : undefined
    );
    await expect(controller(session).initiator.discover()).resolves.toBe(false);
  });
});

describe('InitiatorController.connect', () => {
  it('connects, waits for the device to settle and records it', async () => {
    const session = new FakeSession('initiator', fabric());
    const { initiator, sleep } = controller(session);

    await expect(initiator.connect()).resolves.toBe(true);

    expect(initiator.device).toBe('/dev/nvme1n1');
    expect(initiator.isLinked).toBe(true);
    expect(sleep).toHaveBeenCalledWith(1500);
    expect(session.commands()).toEqual([
      "nvme list | grep tcp | awk '{print $1}'",
      'nvme connect -t tcp -n nqn.test:unit1 -a 192.168.1.49 -s 4420',
      "nvme list | grep tcp | awk '{print $1}'",
    ]);
  });

  it('refuses to connect when fabric devices already exist', async () => {
    const session = new FakeSession('initiator', (request) =>
      request.kind === 'nvmeListFabricDevices' ? ok('/dev/nvme3n1\n') : undefined
    );
    const { initiator } = controller(session);

    await expect(initiator.connect()).resolves.toBe(false);

    expect(session.kinds()).toEqual(['nvmeListFabricDevices']);
    expect(initiator.isLinked).toBe(false);
  });

  it('fails when nvme connect fails', async () => {
    const session = new FakeSession(
      'initiator',
      fabric((request) => (request.kind === 'nvmeConnect' ? fail('could not add new controller') : undefined))
    );
    const { initiator, sleep } = controller(session);

    await expect(initiator.connect()).resolves.toBe(false);

    expect(initiator.isLinked).toBe(false);
    expect(initiator.device).toBeUndefined();
    expect(sleep).not.toHaveBeenCalled();
  });

  it('fails but stays linked when no device shows up', async () => {
    const session = new FakeSession('initiator', (request) =>
      request.kind === 'nvmeListFabricDevices' ? ok('') : undefined
    );
    const { initiator } = controller(session);

    await expect(initiator.connect()).resolves.toBe(false);

    expect(initiator.isLinked).toBe(true);
    expect(initiator.device).toBeUndefined();
  });
});

describe('InitiatorController.runBenchmark', () => {
  const randRead: BenchmarkSpec = { name: 'rand_read', mode: 'randread', blockSize: '4k', runtimeSec: 60 };

  it('requires a connected device', async () => {
    const session = new FakeSession('initiator');
    const { initiator } = controller(session);

    await expect(initiator.runBenchmark(randRead)).rejects.toBeInstanceOf(StateError);
    expect(session.executed).toHaveLength(0);
  });

  it('runs fio against the device and decodes its JSON', async () => {
    const { session, initiator } = await connected(
      fabric((request) => (request.kind === 'fio' ? ok(FIO_JSON) : undefined))
    );

    const record = await initiator.runBenchmark(randRead);

    expect(record).toEqual(JSON.parse(FIO_JSON));
    expect(session.commands().slice(-1)).toEqual([
      'fio --name=rand_read --filename=/dev/nvme1n1 --rw=randread --bs=4k --direct=1 --output-format=json --runtime=60',
    ]);
    expect(session.timeouts.slice(-1)).toEqual([120_000]);
  });

  it('uses the default timeout for size-bounded runs', async () => {
    const { session, initiator } = await connected(
      fabric((request) => (request.kind === 'fio' ? ok(FIO_JSON) : undefined))
    );

    await initiator.runBenchmark({ name: 'seq_read', mode: 'read', blockSize: '1M', size: '1G' });

    expect(session.timeouts.slice(-1)).toEqual([300_000]);
  });

  it('returns an empty record when fio fails', async () => {
    const { initiator } = await connected(
      fabric((request) => (request.kind === 'fio' ? fail('fio: pid=0, err=5/file:io_u.c') : undefined))
    );
    await expect(initiator.runBenchmark(randRead)).resolves.toEqual({});
  });

  it('returns an empty record when the output is not JSON', async () => {
    const { initiator } = await connected(
      fabric((request) => (request.kind === 'fio' ? ok('fio-3.35\nstarting 1 process\n') : undefined))
    );
    await expect(initiator.runBenchmark(randRead)).resolves.toEqual({});
  });
});

describe('InitiatorController.disconnect', () => {
  it('disconnects the subsystem and closes the session', async () => {
    const { session, initiator } = await connected();

    await initiator.disconnect();

    expect(session.commands().slice(-1)).toEqual(['nvme disconnect -n nqn.test:unit1']);
    expect(session.state).toBe('closed');
    expect(initiator.isLinked).toBe(false);
    expect(initiator.device).toBeUndefined();
  });

  it('still closes the session when disconnect fails', async () => {
    const { session, initiator } = await connected(
      fabric((request) => (request.kind === 'nvmeDisconnect' ? fail('no controllers found') : undefined))
    );

    await expect(initiator.disconnect()).resolves.toBeUndefined();
    expect(session.state).toBe('closed');
  });

  it('skips the command when the session is not connected', async () => {
    const session = new FakeSession('initiator');
    const { initiator } = controller(session);

    await initiator.disconnect();

    expect(session.executed).toHaveLength(0);
    expect(session.closeCalls).toBe(1);
  });
});

describe('InitiatorController.collectKernelLog', () => {
  it('reads the dmesg tail while connected', async () => {
    const { initiator } = await connected(
      fabric((request) => (request.kind === 'kernelLog' ? ok('nvme nvme1: new ctrl\n') : undefined))
    );
    await expect(initiator.collectKernelLog(20)).resolves.toBe('nvme nvme1: new ctrl\n');
  });

  it('returns undefined when dmesg fails', async () => {
    const { initiator } = await connected(
      fabric((request) => (request.kind === 'kernelLog' ? fail('dmesg: read kernel buffer failed') : undefined))
    );
    await expect(initiator.collectKernelLog(20)).resolves.toBeUndefined();
  });
});
