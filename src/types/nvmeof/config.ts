export type ConnectionConfig = Readonly<{
  host: string;
  username: string;
  password: string;
  port: number;
}>;

export type TargetConfig = Readonly<{
  connection: ConnectionConfig;
  /** Fabric data address the initiator discovers and connects to. */
  dataIp: string;
  subsystemNqn: string;
  servicePort: number;
  backendDevice: string;
  namespaceCount: number;
  portId: number;
}>;

export type InitiatorConfig = Readonly<{
  connection: ConnectionConfig;
}>;

export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_SERVICE_PORT = 4420;
export const DEFAULT_BACKEND_DEVICE = '/dev/nvme0n1';

export function connectionConfig(
  params: Omit<ConnectionConfig, 'port'> & { port?: number }
): ConnectionConfig {
  return Object.freeze({ ...params, port: params.port ?? DEFAULT_SSH_PORT });
}

export function targetConfig(
  params: Pick<TargetConfig, 'connection' | 'dataIp' | 'subsystemNqn'> &
    Partial<Pick<TargetConfig, 'servicePort' | 'backendDevice' | 'namespaceCount' | 'portId'>>
): TargetConfig {
  return Object.freeze({
    connection: params.connection,
    dataIp: params.dataIp,
    subsystemNqn: params.subsystemNqn,
    servicePort: params.servicePort ?? DEFAULT_SERVICE_PORT,
    backendDevice: params.backendDevice ?? DEFAULT_BACKEND_DEVICE,
    namespaceCount: params.namespaceCount ?? 1,
    portId: params.portId ?? 1,
  });
}
