import type {
  SchemaAction,
  SchemaDatacenter,
  SchemaImage,
  SchemaLocation,
  SchemaMeta,
  SchemaServer,
  SchemaServerType,
  SchemaSSHKey,
} from "../../schema";

export function schemaAction(overrides: Partial<SchemaAction> = {}): SchemaAction {
  return {
    id: 1,
    status: "running",
    command: "start_server",
    progress: 0,
    started: "2024-01-30T23:55:00+00:00",
    finished: null,
    error: null,
    resources: [{ id: 1, type: "server" }],
    ...overrides,
  };
}

export function schemaLocation(overrides: Partial<SchemaLocation> = {}): SchemaLocation {
  return {
    id: 1,
    name: "fsn1",
    description: "Falkenstein DC Park 1",
    country: "DE",
    city: "Falkenstein",
    latitude: 50.47612,
    longitude: 12.370071,
    ...overrides,
  };
}

export function schemaDatacenter(overrides: Partial<SchemaDatacenter> = {}): SchemaDatacenter {
  return {
    id: 1,
    name: "fsn1-dc8",
    description: "Falkenstein 1 DC 8",
    location: schemaLocation(),
    server_types: { available: [1], supported: [1, 2] },
    ...overrides,
  };
}

export function schemaServerType(overrides: Partial<SchemaServerType> = {}): SchemaServerType {
  return {
    id: 1,
    name: "cx11",
    description: "CX11",
    cores: 1,
    memory: 2,
    disk: 20,
    storage_type: "local",
    ...overrides,
  };
}

export function schemaImage(overrides: Partial<SchemaImage> = {}): SchemaImage {
  return {
    id: 4711,
    status: "available",
    type: "system",
    name: "ubuntu-22.04",
    description: "Ubuntu 22.04",
    image_size: null,
    disk_size: 5,
    created: "2024-01-01T00:00:00+00:00",
    created_from: null,
    bound_to: null,
    os_flavor: "ubuntu",
    os_version: "22.04",
    rapid_deploy: true,
    ...overrides,
  };
}

export function schemaSSHKey(overrides: Partial<SchemaSSHKey> = {}): SchemaSSHKey {
  return {
    id: 2323,
    name: "my-key",
    fingerprint: "b7:2f:30:a0:2f:6c:58:6c:21:04:58:61:ba:06:3b:2f",
    public_key: "ssh-ed25519 AAAAtestkey user@example",
    ...overrides,
  };
}

export function schemaServer(overrides: Partial<SchemaServer> = {}): SchemaServer {
  return {
    id: 1,
    name: "my-server",
    status: "running",
    created: "2024-01-30T23:50:00+00:00",
    public_net: {
      ipv4: { ip: "192.0.2.10", blocked: false, dns_ptr: "static.10.2.0.192.example.com" },
      ipv6: { ip: "2001:db8::/64", blocked: false, dns_ptr: null },
      floating_ips: [],
    },
    server_type: schemaServerType(),
    datacenter: schemaDatacenter(),
    image: schemaImage(),
    included_traffic: 21990232555520,
    outgoing_traffic: null,
    ingoing_traffic: null,
    backup_window: null,
    rescue_enabled: false,
    locked: false,
    ...overrides,
  };
}

/** `meta` block for one page of a paginated list */
export function pageMeta(page: number, lastPage: number, perPage = 50): SchemaMeta {
  return {
    pagination: {
      page,
      per_page: perPage,
      previous_page: page > 1 ? page - 1 : null,
      next_page: page < lastPage ? page + 1 : null,
      last_page: lastPage,
      total_entries: null,
    },
  };
}
