import type {
  SchemaAction,
  SchemaDatacenter,
  SchemaImage,
  SchemaLocation,
  SchemaMeta,
  SchemaServer,
  SchemaServerPublicNetIPv4,
  SchemaServerPublicNetIPv6,
  SchemaServerType,
  SchemaSSHKey,
} from "./schema";
import type {
  Action,
  ActionStatus,
  Datacenter,
  IdOrName,
  Image,
  ImageStatus,
  ImageType,
  Location,
  Server,
  ServerPublicNet,
  ServerStatus,
  ServerType,
  SSHKey,
  StorageType,
} from "./models";
import type { Meta } from "./response";

const ACTION_STATUSES: readonly ActionStatus[] = ["running", "success", "error"];
const IMAGE_TYPES: readonly ImageType[] = ["system", "snapshot", "backup"];
const IMAGE_STATUSES: readonly ImageStatus[] = ["available", "creating"];
const STORAGE_TYPES: readonly StorageType[] = ["local", "network"];
const SERVER_STATUSES: readonly ServerStatus[] = [
  "initializing",
  "starting",
  "running",
  "stopping",
  "off",
  "deleting",
  "migrating",
  "rebuilding",
  "unknown",
];

/**
 * Narrow a wire string to a known literal, falling back for values
 * the API introduced after this client was written
 */
function oneOf<T extends string>(value: string, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

export function actionFromSchema(s: SchemaAction): Action {
  return {
    id: s.id,
    status: oneOf(s.status, ACTION_STATUSES, "running"),
    command: s.command,
    progress: s.progress,
    started: new Date(s.started),
    finished: s.finished ? new Date(s.finished) : null,
    errorCode: s.error?.code ?? null,
    errorMessage: s.error?.message ?? null,
    resources: s.resources.map((r) => ({ id: r.id, type: r.type })),
  };
}

export function locationFromSchema(s: SchemaLocation): Location {
  return {
    id: s.id,
    name: s.name,
    description: s.description,
    country: s.country,
    city: s.city,
    latitude: s.latitude,
    longitude: s.longitude,
  };
}

export function datacenterFromSchema(s: SchemaDatacenter): Datacenter {
  return {
    id: s.id,
    name: s.name,
    description: s.description,
    location: locationFromSchema(s.location),
    serverTypes: {
      available: [...s.server_types.available],
      supported: [...s.server_types.supported],
    },
  };
}

export function serverTypeFromSchema(s: SchemaServerType): ServerType {
  return {
    id: s.id,
    name: s.name,
    description: s.description,
    cores: s.cores,
    memory: s.memory,
    disk: s.disk,
    storageType: oneOf(s.storage_type, STORAGE_TYPES, "local"),
  };
}

export function imageFromSchema(s: SchemaImage): Image {
  return {
    id: s.id,
    name: s.name,
    type: oneOf(s.type, IMAGE_TYPES, "system"),
    status: oneOf(s.status, IMAGE_STATUSES, "creating"),
    description: s.description,
    imageSize: s.image_size,
    diskSize: s.disk_size,
    created: new Date(s.created),
    createdFrom: s.created_from ? { id: s.created_from.id, name: s.created_from.name } : null,
    boundTo: s.bound_to,
    osFlavor: s.os_flavor,
    osVersion: s.os_version,
    rapidDeploy: s.rapid_deploy,
  };
}

export function sshKeyFromSchema(s: SchemaSSHKey): SSHKey {
  return {
    id: s.id,
    name: s.name,
    fingerprint: s.fingerprint,
    publicKey: s.public_key,
  };
}

function ipv4FromSchema(s: SchemaServerPublicNetIPv4 | null): ServerPublicNet["ipv4"] {
  if (!s) return null;
  return { ip: s.ip, blocked: s.blocked, dnsPtr: s.dns_ptr };
}

function ipv6FromSchema(s: SchemaServerPublicNetIPv6 | null): ServerPublicNet["ipv6"] {
  if (!s) return null;
  return {
    ip: s.ip,
    blocked: s.blocked,
    dnsPtr: (s.dns_ptr ?? []).map((entry) => ({ ip: entry.ip, dnsPtr: entry.dns_ptr })),
  };
}

export function serverFromSchema(s: SchemaServer): Server {
  return {
    id: s.id,
    name: s.name,
    created: new Date(s.created),
    status: oneOf(s.status, SERVER_STATUSES, "unknown"),
    publicNet: {
      ipv4: ipv4FromSchema(s.public_net.ipv4),
      ipv6: ipv6FromSchema(s.public_net.ipv6),
      floatingIps: [...s.public_net.floating_ips],
    },
    serverType: serverTypeFromSchema(s.server_type),
    datacenter: datacenterFromSchema(s.datacenter),
    image: s.image ? imageFromSchema(s.image) : null,
    includedTraffic: s.included_traffic,
    outgoingTraffic: s.outgoing_traffic,
    ingoingTraffic: s.ingoing_traffic,
    backupWindow: s.backup_window,
    rescueEnabled: s.rescue_enabled,
    locked: s.locked,
  };
}

export function metaFromSchema(s: SchemaMeta | undefined): Meta {
  const pagination = s?.pagination;
  if (!pagination) return {};
  return {
    pagination: {
      page: pagination.page,
      perPage: pagination.per_page,
      previousPage: pagination.previous_page,
      nextPage: pagination.next_page,
      lastPage: pagination.last_page,
      totalEntries: pagination.total_entries,
    },
  };
}

/** Wire form of an ID-or-name reference */
export function idOrNameToSchema(ref: IdOrName): number | string {
  return "id" in ref ? ref.id : ref.name;
}
