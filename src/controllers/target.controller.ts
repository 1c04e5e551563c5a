import { isIP } from 'net';
import logger from '../lib/logger';
import type { TargetConfig } from '../types/nvmeof/config';
import type { RemoteSession } from '../types/session';
import type { FabricTransport, RemoteCommand } from '../services/remote-command';

const NVMET_ROOT = '/sys/kernel/config/nvmet';
const TARGET_MODULES = ['nvmet', 'nvmet-tcp'] as const;
// lsmod reports module names with underscores
const LOADED_MODULE_NAMES = ['nvmet', 'nvmet_tcp'] as const;
const TRANSPORT: FabricTransport = 'tcp';
const FIREWALL_UNIT = 'firewalld';

export type TargetState =
  | 'Unconfigured'
  | 'ModulesLoaded'
  | 'SubsystemCreated'
  | 'NamespacesEnabled'
  | 'PortBound'
  | 'Verified'
  | 'CleanedUp';

type Step = {
  label: string;
  request: RemoteCommand;
};

export const nvmetPaths = {
  subsystem: (nqn: string) => `${NVMET_ROOT}/subsystems/${nqn}`,
  namespace: (nqn: string, id: number) => `${NVMET_ROOT}/subsystems/${nqn}/namespaces/${id}`,
  port: (portId: number) => `${NVMET_ROOT}/ports/${portId}`,
  portLink: (portId: number, nqn: string) => `${NVMET_ROOT}/ports/${portId}/subsystems/${nqn}`,
};

/**
 * Block device exported by a namespace. A single namespace exports the backend
 * device itself; with several, trailing 1s are swapped for the namespace id
 * (/dev/nvme0n1 -> /dev/nvme0n2).
 */
export function namespaceDevice(backendDevice: string, namespaceId: number, namespaceCount: number): string {
  if (namespaceCount <= 1) return backendDevice;
  return `${backendDevice.replace(/1+$/, '')}${namespaceId}`;
}

/**
 * Brings an nvmet TCP target up through configfs on one host and tears it
 * back down. Owns its session for its whole lifetime.
 */
export class TargetController {
  private current: TargetState = 'Unconfigured';
  private readonly log = logger.child('target');

  constructor(
    private readonly config: TargetConfig,
    private readonly session: RemoteSession
  ) {}

  get state(): TargetState {
    return this.current;
  }

  /**
   * Runs every configuration step in order and stops at the first failure.
   * Partial state is left for cleanup().
   */
  async setup(): Promise<boolean> {
    this.log.info('setting up target', {
      host: this.session.host,
      nqn: this.config.subsystemNqn,
      dataIp: this.config.dataIp,
      servicePort: this.config.servicePort,
    });
    await this.open();

    const phases: Array<{ steps: Step[]; reached: TargetState }> = [
      { steps: this.moduleSteps(), reached: 'ModulesLoaded' },
      { steps: this.subsystemSteps(), reached: 'SubsystemCreated' },
      { steps: this.namespaceSteps(), reached: 'NamespacesEnabled' },
      { steps: this.portSteps(), reached: 'PortBound' },
    ];

    for (const phase of phases) {
      for (const step of phase.steps) {
        const result = await this.session.execute(step.request);
        if (!result.success) {
          this.log.error('target setup step failed', {
            step: step.label,
            exitCode: result.exitCode,
            stderr: result.stderr.trim(),
          });
          return false;
        }
      }
      this.current = phase.reached;
    }

    await this.openFirewall();
    this.log.info('target setup completed', { state: this.current });
    return true;
  }

  /**
   * Module presence is checked first: without it the configfs paths cannot
   * exist and their absence says nothing.
   */
  async verify(): Promise<boolean> {
    this.log.info('verifying target configuration');
    await this.open();

    const modules = await this.session.execute({ kind: 'listModules' });
    const modulesLoaded =
      modules.success && LOADED_MODULE_NAMES.every((name) => modules.stdout.includes(name));
    if (!modulesLoaded) {
      this.log.error('verification failed: module loaded', { modules: LOADED_MODULE_NAMES });
      return false;
    }
    this.log.info('check passed: module loaded');

    const checks: Array<{ label: string; path: string }> = [
      { label: 'subsystem exists', path: nvmetPaths.subsystem(this.config.subsystemNqn) },
      { label: 'port configured', path: nvmetPaths.port(this.config.portId) },
    ];
    for (const check of checks) {
      const result = await this.session.execute({ kind: 'pathExists', path: check.path, type: 'dir' });
      if (!result.success) {
        this.log.error(`verification failed: ${check.label}`, { path: check.path });
        return false;
      }
      this.log.info(`check passed: ${check.label}`);
    }

    this.current = 'Verified';
    this.log.info('target verification passed');
    return true;
  }

  /**
   * Best-effort teardown in reverse order of setup. Never throws; every step
   * runs whatever the previous one returned. An idle session is opened first,
   * a closed one is left alone. Closes the session last.
   */
  async cleanup(): Promise<void> {
    this.log.info('cleaning up target configuration', { state: this.current });

    if (this.session.state === 'idle') {
      try {
        await this.session.connect();
      } catch (err) {
        this.log.error('cannot reach target for cleanup', { host: this.session.host, err });
      }
    }

    if (this.session.state !== 'connected') {
      this.log.warn('target session not connected, skipping teardown steps', {
        sessionState: this.session.state,
      });
    } else {
      let failures = 0;
      for (const step of this.teardownSteps()) {
        try {
          const result = await this.session.execute(step.request);
          if (!result.success) {
            failures += 1;
            this.log.warn('cleanup step failed', { step: step.label, stderr: result.stderr.trim() });
          }
        } catch (err) {
          failures += 1;
          this.log.warn('cleanup step raised', { step: step.label, err });
        }
      }
      if (failures > 0) {
        this.log.warn('cleanup had issues', { failures });
      } else {
        this.log.info('cleanup completed');
      }
    }

    try {
      await this.session.close();
    } catch (err) {
      this.log.warn('failed to close target session', { err });
    }
    this.current = 'CleanedUp';
  }

  /** Closes the session and leaves the configuration in place. */
  async release(): Promise<void> {
    await this.session.close();
  }

  /** Tail of the target's kernel log; undefined when the session is gone or dmesg failed. */
  async collectKernelLog(lines: number): Promise<string | undefined> {
    if (this.session.state !== 'connected') return undefined;
    const result = await this.session.execute({ kind: 'kernelLog', lines });
    return result.success ? result.stdout : undefined;
  }

  /** Opens an idle session; throws ConnectionError when the host is unreachable. */
  async open(): Promise<void> {
    if (this.session.state === 'idle') {
      await this.session.connect();
    }
  }

  private namespaceIds(): number[] {
    return Array.from({ length: Math.max(this.config.namespaceCount, 0) }, (_, i) => i + 1);
  }

  private moduleSteps(): Step[] {
    return TARGET_MODULES.map((module): Step => ({
      label: `load module ${module}`,
      request: { kind: 'loadModule', module },
    }));
  }

  private subsystemSteps(): Step[] {
    const subsystem = nvmetPaths.subsystem(this.config.subsystemNqn);
    return [
      { label: 'mount configfs', request: { kind: 'mountConfigfs' } },
      { label: 'create subsystem', request: { kind: 'makeDir', path: subsystem } },
      {
        label: 'allow any host',
        request: { kind: 'writeAttr', path: `${subsystem}/attr_allow_any_host`, value: '1' },
      },
    ];
  }

  private namespaceSteps(): Step[] {
    const { subsystemNqn, backendDevice, namespaceCount } = this.config;
    return this.namespaceIds().flatMap((id): Step[] => {
      const ns = nvmetPaths.namespace(subsystemNqn, id);
      return [
        { label: `create namespace ${id}`, request: { kind: 'makeDir', path: ns } },
        {
          label: `set device_path for namespace ${id}`,
          request: {
            kind: 'writeAttr',
            path: `${ns}/device_path`,
            value: namespaceDevice(backendDevice, id, namespaceCount),
            newline: false,
          },
        },
        {
          label: `enable namespace ${id}`,
          request: { kind: 'writeAttr', path: `${ns}/enable`, value: '1' },
        },
      ];
    });
  }

  private portSteps(): Step[] {
    const { portId, dataIp, servicePort, subsystemNqn } = this.config;
    const port = nvmetPaths.port(portId);
    const attrs: Array<[string, string]> = [
      ['addr_trtype', TRANSPORT],
      ['addr_adrfam', isIP(dataIp) === 6 ? 'ipv6' : 'ipv4'],
      ['addr_traddr', dataIp],
      ['addr_trsvcid', String(servicePort)],
    ];
    return [
      { label: `create port ${portId}`, request: { kind: 'makeDir', path: port } },
      ...attrs.map(([attr, value]): Step => ({
        label: `set ${attr}`,
        request: { kind: 'writeAttr', path: `${port}/${attr}`, value },
      })),
      {
        label: 'bind subsystem to port',
        request: {
          kind: 'symlink',
          target: nvmetPaths.subsystem(subsystemNqn),
          link: nvmetPaths.portLink(portId, subsystemNqn),
        },
      },
    ];
  }

  private teardownSteps(): Step[] {
    const { portId, subsystemNqn } = this.config;
    const namespaceSteps = this.namespaceIds().flatMap((id): Step[] => {
      const ns = nvmetPaths.namespace(subsystemNqn, id);
      return [
        {
          label: `disable namespace ${id}`,
          request: { kind: 'writeAttr', path: `${ns}/enable`, value: '0', onlyIfPresent: true },
        },
        { label: `remove namespace ${id}`, request: { kind: 'removeDir', path: ns } },
      ];
    });
    return [
      { label: 'unbind port link', request: { kind: 'removeLink', path: nvmetPaths.portLink(portId, subsystemNqn) } },
      ...namespaceSteps,
      { label: 'remove subsystem', request: { kind: 'removeDir', path: nvmetPaths.subsystem(subsystemNqn) } },
      { label: 'remove port', request: { kind: 'removeDir', path: nvmetPaths.port(portId) } },
    ];
  }

  private async openFirewall(): Promise<void> {
    const active = await this.session.execute({ kind: 'serviceActive', unit: FIREWALL_UNIT });
    if (!active.success) {
      this.log.info('firewalld not active, skipping firewall configuration');
      return;
    }
    const opened = await this.session.execute({
      kind: 'firewallOpenPort',
      port: this.config.servicePort,
      transport: TRANSPORT,
    });
    const reloaded = await this.session.execute({ kind: 'firewallReload' });
    if (opened.success && reloaded.success) {
      this.log.info('firewall configured', { port: this.config.servicePort });
    } else {
      this.log.warn('firewall configuration had issues', { port: this.config.servicePort });
    }
  }
}
