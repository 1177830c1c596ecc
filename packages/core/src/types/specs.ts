/**
 * Operation inputs and results shared by every adapter.
 */

/** Backend-native filters, e.g. `{ label: 'utopia-created' }` */
export type Filters = Readonly<Record<string, string>>;

/**
 * Description of a container to launch.
 */
export interface RunSpec {
  image: string;
  name: string;
  command?: readonly string[];
  entrypoint?: string;
  workdir?: string;
  /** Bind specs in `source:target[:mode]` form */
  volumes?: readonly string[];
  env?: Readonly<Record<string, string>>;
  /** Host folder mounted read-write at /tmp */
  mountFolder?: string;
  labels?: Readonly<Record<string, string>>;
  hostname?: string;
  /** Remove the container when it exits */
  remove?: boolean;
  network?: string;
}

/**
 * A command to run inside an existing container.
 */
export interface ExecSpec {
  name: string;
  command: readonly string[];
  env?: Readonly<Record<string, string>>;
  /** Seconds; zero or negative means no timeout */
  timeout?: number;
}

export interface ExecuteResult {
  stdout: string;
  stderr: string;
}

export interface ListOptions {
  filters?: Filters;
}

export interface StatsOptions {
  /** Only this container; otherwise every container matching `filters` */
  container?: string;
  filters?: Filters;
}

export interface CreateNetworkOptions {
  internal?: boolean;
}

export interface NetworkDisconnectOptions {
  force?: boolean;
}

export interface RemoveOptions {
  force?: boolean;
}

/**
 * Registry credentials, passed through to the backend untouched.
 */
export interface RegistryCredentials {
  username: string;
  password: string;
  email?: string;
  /** Defaults to Docker Hub */
  serverAddress?: string;
}
