/**
 * Managed service instance types
 */

/**
 * Network location of a running service instance as reported by a launcher.
 */
export interface ServiceEndpoint {
  host: string;
  port: number;
  /** Launcher-specific handle (container id for the docker launcher) */
  containerId?: string;
}

/**
 * The single shared service instance for a label.
 */
export interface ServiceInstance extends ServiceEndpoint {
  readonly label: string;
  /** `http://host:port`, no trailing slash */
  readonly baseUrl: string;
  running: boolean;
  startedAt: number;
  /** True when the instance was found running rather than launched by this process */
  reused: boolean;
}

/**
 * Everything a launcher needs to start a new instance.
 */
export interface ServiceLaunchSpec {
  label: string;
  labelKey: string;
  image: string;
  hostPort: number;
  containerPort: number;
  hostCacheDir: string;
  containerCacheDir: string;
  env: Readonly<Record<string, string>>;
}

/**
 * Starts or finds the managed service process.
 */
export interface ServiceLauncher {
  /** Locate an instance already running under the label, if any */
  findRunning(label: string, labelKey: string, containerPort: number): Promise<ServiceEndpoint | null>;
  /** Start a new instance and resolve once its port is published */
  launch(spec: ServiceLaunchSpec): Promise<ServiceEndpoint>;
}

/**
 * Caller-owned configuration registry that receives the resolved endpoint.
 * Suppliers are evaluated lazily by the owner.
 */
export interface PropertyRegistry {
  add(name: string, supplier: () => string): void;
}
