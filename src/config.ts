export type TransportKind = 'rest' | 'rpc';
export type SyncDirection = 'push' | 'pull' | 'both';

export type SyncConfig = {
  transport: TransportKind;
  direction: SyncDirection;
  importForce: boolean;
  lnd: {
    restHost: string;
    grpcHost: string;
    macaroonPath?: string;
    tlsCertPath?: string;
  };
  ec: {
    restHost: string;
    grpcHost: string;
    tlsCertPath?: string;
  };
};

type Env = Record<string, string | undefined>;

export function readSyncConfig(env: Env = process.env): SyncConfig {
  const str = (k: string, d: string) => {
    const v = String(env[k] ?? '').trim();
    return v || d;
  };
  const opt = (k: string) => {
    const v = String(env[k] ?? '').trim();
    return v || undefined;
  };
  const transport = str('SYNC_TRANSPORT', 'rest').toLowerCase();
  const direction = str('SYNC_DIRECTION', 'both').toLowerCase();
  return {
    transport: transport === 'rpc' || transport === 'grpc' ? 'rpc' : 'rest',
    direction: direction === 'push' || direction === 'pull' ? direction : 'both',
    importForce: env.IMPORT_FORCE === 'true',
    lnd: {
      restHost: str('LND_REST_HOST', 'localhost:8080'),
      grpcHost: str('LND_GRPC_HOST', 'localhost:10009'),
      macaroonPath: opt('LND_MACAROON_PATH'),
      tlsCertPath: opt('LND_TLS_CERT'),
    },
    ec: {
      restHost: str('EC_REST_HOST', 'localhost:8081'),
      grpcHost: str('EC_GRPC_HOST', 'localhost:50050'),
      tlsCertPath: opt('EC_TLS_CERT'),
    },
  };
}
