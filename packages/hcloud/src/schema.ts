/**
 * Hetzner Cloud API wire types
 * Field names and nullability follow the JSON the API sends and accepts
 */

// ============================================================================
// Meta / errors
// ============================================================================

export interface SchemaMetaPagination {
  page: number;
  per_page: number;
  previous_page: number | null;
  next_page: number | null;
  last_page: number | null;
  total_entries: number | null;
}

export interface SchemaMeta {
  pagination?: SchemaMetaPagination;
}

export interface SchemaError {
  code: string;
  message: string;
  details?: unknown;
}

export interface SchemaErrorResponse {
  error: SchemaError;
}

// ============================================================================
// Actions
// ============================================================================

export interface SchemaActionResource {
  id: number;
  type: string;
}

export interface SchemaAction {
  id: number;
  status: string;
  command: string;
  progress: number;
  started: string;
  finished: string | null;
  error: { code: string; message: string } | null;
  resources: SchemaActionResource[];
}

export interface SchemaActionGetResponse {
  action: SchemaAction;
}

export interface SchemaActionListResponse {
  actions: SchemaAction[];
}

// ============================================================================
// Locations / datacenters / server types
// ============================================================================

export interface SchemaLocation {
  id: number;
  name: string;
  description: string;
  country: string;
  city: string;
  latitude: number;
  longitude: number;
}

export interface SchemaLocationGetResponse {
  location: SchemaLocation;
}

export interface SchemaLocationListResponse {
  locations: SchemaLocation[];
}

export interface SchemaDatacenter {
  id: number;
  name: string;
  description: string;
  location: SchemaLocation;
  server_types: {
    available: number[];
    supported: number[];
  };
}

export interface SchemaDatacenterGetResponse {
  datacenter: SchemaDatacenter;
}

export interface SchemaDatacenterListResponse {
  datacenters: SchemaDatacenter[];
}

export interface SchemaServerType {
  id: number;
  name: string;
  description: string;
  cores: number;
  memory: number;
  disk: number;
  storage_type: string;
}

export interface SchemaServerTypeGetResponse {
  server_type: SchemaServerType;
}

export interface SchemaServerTypeListResponse {
  server_types: SchemaServerType[];
}

// ============================================================================
// Images
// ============================================================================

export interface SchemaImage {
  id: number;
  status: string;
  type: string;
  name: string | null;
  description: string;
  image_size: number | null;
  disk_size: number;
  created: string;
  created_from: { id: number; name: string } | null;
  bound_to: number | null;
  os_flavor: string;
  os_version: string | null;
  rapid_deploy: boolean;
}

export interface SchemaImageGetResponse {
  image: SchemaImage;
}

export interface SchemaImageListResponse {
  images: SchemaImage[];
}

export interface SchemaImageUpdateRequest {
  description?: string;
  type?: string;
}

export interface SchemaImageUpdateResponse {
  image: SchemaImage;
}

// ============================================================================
// SSH keys
// ============================================================================

export interface SchemaSSHKey {
  id: number;
  name: string;
  fingerprint: string;
  public_key: string;
}

export interface SchemaSSHKeyGetResponse {
  ssh_key: SchemaSSHKey;
}

export interface SchemaSSHKeyListResponse {
  ssh_keys: SchemaSSHKey[];
}

export interface SchemaSSHKeyCreateRequest {
  name: string;
  public_key: string;
}

export interface SchemaSSHKeyCreateResponse {
  ssh_key: SchemaSSHKey;
}

export interface SchemaSSHKeyUpdateRequest {
  name?: string;
}

export interface SchemaSSHKeyUpdateResponse {
  ssh_key: SchemaSSHKey;
}

// ============================================================================
// Servers
// ============================================================================

export interface SchemaServerPublicNetIPv4 {
  ip: string;
  blocked: boolean;
  dns_ptr: string;
}

export interface SchemaServerPublicNetIPv6 {
  ip: string;
  blocked: boolean;
  dns_ptr: Array<{ ip: string; dns_ptr: string }> | null;
}

/** ipv4 is null for IPv6-only servers and ipv6 for IPv4-only ones */
export interface SchemaServerPublicNet {
  ipv4: SchemaServerPublicNetIPv4 | null;
  ipv6: SchemaServerPublicNetIPv6 | null;
  floating_ips: number[];
}

export interface SchemaServer {
  id: number;
  name: string;
  status: string;
  created: string;
  public_net: SchemaServerPublicNet;
  server_type: SchemaServerType;
  datacenter: SchemaDatacenter;
  image: SchemaImage | null;
  included_traffic: number;
  outgoing_traffic: number | null;
  ingoing_traffic: number | null;
  backup_window: string | null;
  rescue_enabled: boolean;
  locked: boolean;
}

export interface SchemaServerGetResponse {
  server: SchemaServer;
}

export interface SchemaServerListResponse {
  servers: SchemaServer[];
}

export interface SchemaServerCreateRequest {
  name: string;
  server_type: number | string;
  image: number | string;
  ssh_keys?: number[];
  location?: number | string;
  datacenter?: number | string;
  user_data?: string;
  start_after_create?: boolean;
}

export interface SchemaServerCreateResponse {
  server: SchemaServer;
  action?: SchemaAction | null;
  root_password?: string | null;
}

export interface SchemaServerUpdateRequest {
  name?: string;
}

export interface SchemaServerUpdateResponse {
  server: SchemaServer;
}

export interface SchemaServerActionResponse {
  action: SchemaAction;
}

export interface SchemaServerActionResetPasswordResponse {
  action: SchemaAction;
  root_password?: string | null;
}

export interface SchemaServerActionCreateImageRequest {
  type?: string;
  description?: string;
}

export interface SchemaServerActionCreateImageResponse {
  action: SchemaAction;
  image: SchemaImage;
}

export interface SchemaServerActionEnableRescueRequest {
  type?: string;
  ssh_keys?: number[];
}

export interface SchemaServerActionEnableRescueResponse {
  action: SchemaAction;
  root_password?: string | null;
}

export interface SchemaServerActionRebuildRequest {
  image: number | string;
}

export interface SchemaServerActionRebuildResponse {
  action: SchemaAction;
  root_password?: string | null;
}

export interface SchemaServerActionChangeTypeRequest {
  server_type: number | string;
  upgrade_disk: boolean;
}
