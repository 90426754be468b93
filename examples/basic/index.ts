/**
 * Basic example
 *
 * This example demonstrates:
 *   - Building a client from HCLOUD_TOKEN
 *   - Uploading an SSH key and creating a server with it
 *   - Waiting for actions and running power actions
 *   - Cleaning up the server and the key
 *
 * Prerequisites:
 *   - HCLOUD_TOKEN set to a project API token
 */

import { setTimeout as sleep } from "node:timers/promises";
import { Result } from "better-result";
import {
  ApiError,
  clientFromEnv,
  describeError,
  type Action,
  type Client,
  type ClientError,
} from "@hcloud-ts/client";

const PUBLIC_KEY = process.env.SSH_PUBLIC_KEY ?? "ssh-ed25519 AAAAexamplekey example@localhost";

async function waitForAction(
  client: Client,
  action: Action,
  timeoutMs = 120000
): Promise<Result<Action, ClientError | Error>> {
  const start = Date.now();
  let current = action;
  while (current.status === "running") {
    if (Date.now() - start > timeoutMs) {
      return Result.err(new Error(`Timeout waiting for action ${action.id} (${action.command})`));
    }
    await sleep(1000);
    const refreshed = await client.action.get(action.id);
    if (refreshed.isErr()) {
      return Result.err(refreshed.error);
    }
    const next = refreshed.unwrap().action;
    if (!next) {
      return Result.err(new Error(`Action ${action.id} disappeared`));
    }
    current = next;
  }
  if (current.status === "error") {
    return Result.err(new Error(`Action ${current.command} failed: ${current.errorMessage ?? "unknown error"}`));
  }
  return Result.ok(current);
}

function describe(error: ClientError | Error): string {
  return ApiError.is(error) ? describeError(error) : error.message;
}

function fail(step: string, error: ClientError | Error): never {
  console.error(`${step}:`, describe(error));
  process.exit(1);
}

async function main() {
  console.log("=== Basic Example ===\n");

  const clientResult = clientFromEnv(process.env, { applicationName: "basic-example" });
  if (clientResult.isErr()) {
    fail("Invalid configuration", clientResult.error);
  }
  const client = clientResult.unwrap();

  // Step 1: Upload an SSH key
  console.log("1. Uploading SSH key...");
  const keyResult = await client.sshKey.create({ name: "basic-example", publicKey: PUBLIC_KEY });
  if (keyResult.isErr()) {
    fail("Failed to create SSH key", keyResult.error);
  }
  const { sshKey } = keyResult.unwrap();
  console.log(`   Fingerprint: ${sshKey.fingerprint}`);

  // Step 2: Create a server
  console.log("\n2. Creating server...");
  const createResult = await client.server.create({
    name: "basic-example",
    serverType: { name: "cx11" },
    image: { name: "ubuntu-22.04" },
    sshKeys: [sshKey],
    location: { name: "fsn1" },
  });
  if (createResult.isErr()) {
    await client.sshKey.delete(sshKey.id);
    fail("Failed to create server", createResult.error);
  }
  const { server, action } = createResult.unwrap();
  console.log(`   Server ID: ${server.id}`);
  console.log(`   IPv4: ${server.publicNet.ipv4?.ip ?? "none"}`);

  if (action) {
    const created = await waitForAction(client, action);
    if (created.isErr()) {
      await cleanup(client, server.id, sshKey.id);
      fail("Server creation did not finish", created.error);
    }
  }
  console.log("   Server is running!");

  // Step 3: Reboot
  console.log("\n3. Rebooting...");
  const rebootResult = await client.server.reboot(server);
  if (rebootResult.isErr()) {
    await cleanup(client, server.id, sshKey.id);
    fail("Failed to reboot", rebootResult.error);
  }
  const rebooted = await waitForAction(client, rebootResult.unwrap().action);
  if (rebooted.isErr()) {
    await cleanup(client, server.id, sshKey.id);
    fail("Reboot did not finish", rebooted.error);
  }
  console.log("   Rebooted");

  // Step 4: List servers
  console.log("\n4. Listing servers...");
  const allResult = await client.server.all();
  if (allResult.isOk()) {
    for (const s of allResult.unwrap()) {
      console.log(`   ${s.id}  ${s.name}  ${s.status}`);
    }
  }

  await cleanup(client, server.id, sshKey.id);
  console.log("\n=== Done ===");
}

async function cleanup(client: Client, serverId: number, sshKeyId: number) {
  console.log("\nCleaning up...");
  const serverDeleted = await client.server.delete(serverId);
  if (serverDeleted.isErr()) {
    console.error("   Failed to delete server:", describeError(serverDeleted.error));
  }
  const keyDeleted = await client.sshKey.delete(sshKeyId);
  if (keyDeleted.isErr()) {
    console.error("   Failed to delete SSH key:", describeError(keyDeleted.error));
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
