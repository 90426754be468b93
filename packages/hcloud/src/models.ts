/**
 * Domain models returned by the resource clients
 */

/** Reference to a resource by ID or by name, as the API accepts both */
export type IdOrName = { id: number } | { name: string };

// ============================================================================
// Actions
// ============================================================================

export type ActionStatus = "running" | "success" | "error";

export interface ActionResource {
  id: number;
  type: string;
}

/**
 * Record of an asynchronous operation triggered on the API side.
 * Returned in whatever state the API reports; polling is up to the caller.
 */
export interface Action {
  id: number;
  status: ActionStatus;
  command: string;
  progress: number;
  started: Date;
  finished: Date | null;
  errorCode: string | null;
  errorMessage: string | null;
  resources: ActionResource[];
}

// ============================================================================
// Locations / datacenters / server types
// ============================================================================

export interface Location {
  id: number;
  name: string;
  description: string;
  country: string;
  city: string;
  latitude: number;
  longitude: number;
}

export interface Datacenter {
  id: number;
  name: string;
  description: string;
  location: Location;
  serverTypes: {
    /** IDs of server types that can currently be created here */
    available: number[];
    /** IDs of server types supported in general */
    supported: number[];
  };
}

export type StorageType = "local" | "network";

export interface ServerType {
  id: number;
  name: string;
  description: string;
  cores: number;
  /** Memory in GB */
  memory: number;
  /** Disk size in GB */
  disk: number;
  storageType: StorageType;
}

// ============================================================================
// Images
// ============================================================================

export type ImageType = "system" | "snapshot" | "backup";

export type ImageStatus = "available" | "creating";

export interface Image {
  id: number;
  name: string | null;
  type: ImageType;
  status: ImageStatus;
  description: string;
  /** Size in GB, null until the image is available */
  imageSize: number | null;
  diskSize: number;
  created: Date;
  createdFrom: { id: number; name: string } | null;
  /** Server ID a backup image is bound to */
  boundTo: number | null;
  osFlavor: string;
  osVersion: string | null;
  rapidDeploy: boolean;
}

// ============================================================================
// SSH keys
// ============================================================================

export interface SSHKey {
  id: number;
  name: string;
  fingerprint: string;
  publicKey: string;
}

// ============================================================================
// Servers
// ============================================================================

export type ServerStatus =
  | "initializing"
  | "starting"
  | "running"
  | "stopping"
  | "off"
  | "deleting"
  | "migrating"
  | "rebuilding"
  | "unknown";

export interface ServerPublicNet {
  /** null for IPv6-only servers */
  ipv4: {
    ip: string;
    blocked: boolean;
    dnsPtr: string;
  } | null;
  /** null for IPv4-only servers */
  ipv6: {
    ip: string;
    blocked: boolean;
    dnsPtr: Array<{ ip: string; dnsPtr: string }>;
  } | null;
  floatingIps: number[];
}

export interface Server {
  id: number;
  name: string;
  created: Date;
  status: ServerStatus;
  publicNet: ServerPublicNet;
  serverType: ServerType;
  datacenter: Datacenter;
  image: Image | null;
  includedTraffic: number;
  outgoingTraffic: number | null;
  ingoingTraffic: number | null;
  backupWindow: string | null;
  rescueEnabled: boolean;
  locked: boolean;
}

/** Anything carrying a server ID, e.g. a full Server or `{ id: 42 }` */
export type ServerRef = Pick<Server, "id">;

export type RescueType = "linux64" | "linux32" | "freebsd64";
