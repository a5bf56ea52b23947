/**
 * A forward proxy the render backends can route through.
 * Parsed once from a proxy list line and never mutated afterwards.
 */
export interface ProxyEndpoint {
  readonly server: string; // Always "http://host:port"
  readonly username?: string;
  readonly password?: string;
}

export interface PlaywrightProxy {
  server: string;
  username?: string;
  password?: string;
}

export interface AxiosProxy {
  protocol: string;
  host: string;
  port: number;
  auth?: {
    username: string;
    password: string;
  };
}

export interface ProxyRotatorStats {
  endpoints: number;
  currentIndex: number;
  usesSinceRotation: number;
  rotations: number;
}
