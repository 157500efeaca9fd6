import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { promisify } from 'node:util';

import type { HostEnvironmentMode, TestContainerConfig } from './config';

export const LOOPBACK_ADDRESS = '127.0.0.1';
export const DEFAULT_DOCKER_SOCKET = '/var/run/docker.sock';

export type TlsMaterial = { ca: string; cert: string; key: string };

export type EngineConnection =
  | { kind: 'socket'; socketPath: string }
  | { kind: 'tcp'; protocol: 'http' | 'https'; host: string; port: number; tls?: TlsMaterial };

export type HostEnvironment =
  | { kind: 'local'; hostAddress: string; connection: EngineConnection }
  | { kind: 'remote-vm'; hostAddress: string; connection: EngineConnection; certPath: string };

export type HostEnvironmentKind = HostEnvironment['kind'];

export type HostEnvironmentContext = {
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
  homeDir: string;
  config: Pick<TestContainerConfig, 'hostEnvironment' | 'vmHelper' | 'vmPort' | 'vmCertPath'>;
  /** Runs an external helper and resolves with its stdout. */
  runCommand: (command: string, args: string[]) => Promise<string>;
  readFile: (filePath: string) => Promise<string>;
};

const execFileAsync = promisify(execFile);

export function defaultHostEnvironmentContext(
  config: HostEnvironmentContext['config'],
): HostEnvironmentContext {
  return {
    platform: process.platform,
    env: process.env,
    homeDir: os.homedir(),
    config,
    runCommand: async (command, args) => {
      const { stdout } = await execFileAsync(command, args, { encoding: 'utf8', timeout: 120_000 });
      return stdout;
    },
    readFile: (filePath) => readFile(filePath, 'utf8'),
  };
}

export function selectHostEnvironmentKind(mode: HostEnvironmentMode, platform: NodeJS.Platform): HostEnvironmentKind {
  if (mode !== 'auto') return mode;
  return platform === 'darwin' ? 'remote-vm' : 'local';
}

async function loadTlsMaterial(certPath: string, read: HostEnvironmentContext['readFile']): Promise<TlsMaterial> {
  const [ca, cert, key] = await Promise.all([
    read(path.join(certPath, 'ca.pem')),
    read(path.join(certPath, 'cert.pem')),
    read(path.join(certPath, 'key.pem')),
  ]);
  return { ca, cert, key };
}

/**
 * Engine on this machine. Honours DOCKER_HOST (`unix://` or `tcp://`) and DOCKER_SOCKET;
 * containers are reached on the loopback address either way.
 */
export async function resolveLocalEnvironment(context: HostEnvironmentContext): Promise<HostEnvironment> {
  const dockerHost = context.env.DOCKER_HOST?.trim();
  if (dockerHost?.startsWith('unix://')) {
    return {
      kind: 'local',
      hostAddress: LOOPBACK_ADDRESS,
      connection: { kind: 'socket', socketPath: dockerHost.slice('unix://'.length) },
    };
  }
  if (dockerHost?.startsWith('tcp://')) {
    const url = new URL(dockerHost.replace(/^tcp:/, 'http:'));
    const tlsVerify = Boolean(context.env.DOCKER_TLS_VERIFY?.trim()) && context.env.DOCKER_TLS_VERIFY !== '0';
    const certPath = context.env.DOCKER_CERT_PATH?.trim();
    const tls = tlsVerify && certPath ? await loadTlsMaterial(certPath, context.readFile) : undefined;
    return {
      kind: 'local',
      hostAddress: LOOPBACK_ADDRESS,
      connection: {
        kind: 'tcp',
        protocol: tlsVerify ? 'https' : 'http',
        host: url.hostname,
        port: url.port ? Number(url.port) : tlsVerify ? 2376 : 2375,
        tls,
      },
    };
  }
  if (dockerHost) {
    throw new Error(`Unsupported DOCKER_HOST '${dockerHost}' (expected unix:// or tcp://)`);
  }
  return {
    kind: 'local',
    hostAddress: LOOPBACK_ADDRESS,
    connection: { kind: 'socket', socketPath: context.env.DOCKER_SOCKET?.trim() || DEFAULT_DOCKER_SOCKET },
  };
}

/**
 * Engine inside a helper VM. Brings the VM up, asks it for its address and talks TLS to it
 * with the client certificates the helper wrote under the user's home directory.
 */
export async function resolveRemoteVmEnvironment(context: HostEnvironmentContext): Promise<HostEnvironment> {
  const { vmHelper, vmPort } = context.config;
  await context.runCommand(vmHelper, ['up']);
  const hostAddress = (await context.runCommand(vmHelper, ['ip'])).trim();
  if (!hostAddress) {
    throw new Error(`'${vmHelper} ip' returned no address`);
  }
  const certPath =
    context.config.vmCertPath ?? path.join(context.homeDir, '.boot2docker', 'certs', 'boot2docker-vm');
  const tls = await loadTlsMaterial(certPath, context.readFile);
  return {
    kind: 'remote-vm',
    hostAddress,
    certPath,
    connection: { kind: 'tcp', protocol: 'https', host: hostAddress, port: vmPort, tls },
  };
}

const resolvers: Record<HostEnvironmentKind, (context: HostEnvironmentContext) => Promise<HostEnvironment>> = {
  local: resolveLocalEnvironment,
  'remote-vm': resolveRemoteVmEnvironment,
};

export function resolveHostEnvironment(context: HostEnvironmentContext): Promise<HostEnvironment> {
  const kind = selectHostEnvironmentKind(context.config.hostEnvironment, context.platform);
  return resolvers[kind](context);
}
