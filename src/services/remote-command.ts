import type { AccessMode } from '../types/report';

export type FabricTransport = 'tcp';

export type FabricAddress = {
  transport: FabricTransport;
  address: string;
  serviceId: number;
};

export type FioJob = {
  name: string;
  filename: string;
  mode: AccessMode;
  blockSize: string;
  size?: string;
  runtimeSec?: number;
  mixRead?: number;
};

/**
 * Remote operations as typed requests. They only become shell text in
 * renderCommand(), at the session boundary, with every value quoted.
 */
export type RemoteCommand =
  | { kind: 'loadModule'; module: string }
  | { kind: 'listModules' }
  | { kind: 'mountConfigfs' }
  | { kind: 'makeDir'; path: string }
  | { kind: 'writeAttr'; path: string; value: string; newline?: boolean; onlyIfPresent?: boolean }
  | { kind: 'symlink'; target: string; link: string }
  | { kind: 'pathExists'; path: string; type: 'dir' | 'link' }
  | { kind: 'removeLink'; path: string }
  | { kind: 'removeDir'; path: string }
  | { kind: 'serviceActive'; unit: string }
  | { kind: 'firewallOpenPort'; port: number; transport: FabricTransport }
  | { kind: 'firewallReload' }
  | { kind: 'nvmeDiscover'; fabric: FabricAddress }
  | { kind: 'nvmeConnect'; fabric: FabricAddress; nqn: string }
  | { kind: 'nvmeListFabricDevices'; transport: FabricTransport }
  | { kind: 'nvmeDisconnect'; nqn: string }
  | { kind: 'fio'; job: FioJob }
  | { kind: 'kernelLog'; lines: number };

export type RemoteCommandKind = RemoteCommand['kind'];

const CONFIGFS_MOUNT = '/sys/kernel/config';
const SAFE_ARG = /^[A-Za-z0-9_\-.,:/@%+=]+$/;

export function shellQuote(value: string | number): string {
  const text = String(value);
  if (SAFE_ARG.test(text)) return text;
  return `'${text.replace(/'/g, `'\\''`)}'`;
}

function fabricArgs(fabric: FabricAddress): string {
  return `-t ${shellQuote(fabric.transport)} -a ${shellQuote(fabric.address)} -s ${shellQuote(fabric.serviceId)}`;
}

function fioArgs(job: FioJob): string[] {
  const parts = [
    'fio',
    `--name=${shellQuote(job.name)}`,
    `--filename=${shellQuote(job.filename)}`,
    `--rw=${shellQuote(job.mode)}`,
    `--bs=${shellQuote(job.blockSize)}`,
    '--direct=1',
    '--output-format=json',
  ];
  if (job.size) parts.push(`--size=${shellQuote(job.size)}`);
  if (job.runtimeSec) parts.push(`--runtime=${shellQuote(job.runtimeSec)}`);
  if (job.mixRead !== undefined) parts.push(`--rwmixread=${shellQuote(job.mixRead)}`);
  return parts;
}

export function renderCommand(request: RemoteCommand): string {
  switch (request.kind) {
    case 'loadModule':
      return `modprobe ${shellQuote(request.module)}`;
    case 'listModules':
      return 'lsmod';
    case 'mountConfigfs':
      return `mount | grep -q configfs || mount -t configfs none ${CONFIGFS_MOUNT}`;
    case 'makeDir':
      return `mkdir -p ${shellQuote(request.path)}`;
    case 'writeAttr': {
      const format = request.newline === false ? "'%s'" : "'%s\\n'";
      const write = `printf ${format} ${shellQuote(request.value)} > ${shellQuote(request.path)}`;
      return request.onlyIfPresent
        ? `if [ -e ${shellQuote(request.path)} ]; then ${write}; fi`
        : write;
    }
    case 'symlink':
      return `[ -L ${shellQuote(request.link)} ] || ln -s ${shellQuote(request.target)} ${shellQuote(request.link)}`;
    case 'pathExists':
      return `test ${request.type === 'dir' ? '-d' : '-L'} ${shellQuote(request.path)}`;
    case 'removeLink':
      return `if [ -L ${shellQuote(request.path)} ]; then unlink ${shellQuote(request.path)}; fi`;
    case 'removeDir':
      return `if [ -d ${shellQuote(request.path)} ]; then rmdir ${shellQuote(request.path)}; fi`;
    case 'serviceActive':
      return `systemctl is-active ${shellQuote(request.unit)}`;
    case 'firewallOpenPort':
      return `firewall-cmd --add-port=${shellQuote(`${request.port}/${request.transport}`)} --permanent`;
    case 'firewallReload':
      return 'firewall-cmd --reload';
    case 'nvmeDiscover':
      return `nvme discover ${fabricArgs(request.fabric)}`;
    case 'nvmeConnect':
      return `nvme connect -t ${shellQuote(request.fabric.transport)} -n ${shellQuote(request.nqn)} -a ${shellQuote(request.fabric.address)} -s ${shellQuote(request.fabric.serviceId)}`;
    case 'nvmeListFabricDevices':
      return `nvme list | grep ${shellQuote(request.transport)} | awk '{print $1}'`;
    case 'nvmeDisconnect':
      return `nvme disconnect -n ${shellQuote(request.nqn)}`;
    case 'fio':
      return fioArgs(request.job).join(' ');
    case 'kernelLog':
      return `dmesg | tail -n ${shellQuote(request.lines)}`;
  }
}
