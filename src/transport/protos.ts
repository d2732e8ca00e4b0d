import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import * as protoLoader from '@grpc/proto-loader';

// keepCase: records keep their proto field names; longs/bytes as strings match the REST gateways.
export const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  bytes: String,
  defaults: true,
  oneofs: true,
};

export const ROUTER_SERVICE = 'routerrpc.Router';
export const COORDINATOR_SERVICE = 'ecrpc.ExternalCoordinator';

function protoDir(): string {
  // src/transport -> proto, or dist/src/transport -> proto
  const candidates = ['../../proto/', '../../../proto/'].map(rel => fileURLToPath(new URL(rel, import.meta.url)));
  for (const dir of candidates) {
    if (fs.existsSync(dir)) return dir;
  }
  throw new Error(`proto directory not found (looked in ${candidates.join(', ')})`);
}

let cached: { router: protoLoader.ServiceDefinition; coordinator: protoLoader.ServiceDefinition } | undefined;

function service(def: protoLoader.PackageDefinition, name: string): protoLoader.ServiceDefinition {
  const svc = def[name];
  if (!svc || 'format' in svc) throw new Error(`service ${name} missing from proto definitions`);
  return svc;
}

export function loadServices() {
  if (cached) return cached;
  const dir = protoDir();
  const router = protoLoader.loadSync('router.proto', { ...LOADER_OPTIONS, includeDirs: [dir] });
  const coordinator = protoLoader.loadSync('external_coordinator.proto', { ...LOADER_OPTIONS, includeDirs: [dir] });
  cached = { router: service(router, ROUTER_SERVICE), coordinator: service(coordinator, COORDINATOR_SERVICE) };
  return cached;
}

export function method(svc: protoLoader.ServiceDefinition, name: string): protoLoader.MethodDefinition<object, object> {
  const m = svc[name];
  if (!m) throw new Error(`method ${name} missing from service`);
  return m;
}
