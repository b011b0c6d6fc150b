import type { ClientAdapter } from "../core/types.js";
import { NotFoundError } from "../core/errors.js";
import { JsonFileClient } from "./json-file-client.js";
import { CLIENT_DEFINITIONS } from "./definitions.js";
import type { PlatformContext } from "./platform.js";

/**
 * A client the registry can hand out: the adapter contract plus the
 * discovery details the CLI shows.
 */
export interface RegisteredClient extends ClientAdapter {
  readonly id: string;
  readonly configPath: string;
  isInstalled(): boolean;
}

/**
 * Clients known to one CLI invocation. Constructed explicitly and passed
 * around; there is no process-wide instance.
 */
export class ClientRegistry {
  private readonly clients: RegisteredClient[] = [];

  register(client: RegisteredClient): void {
    this.clients.push(client);
  }

  list(): readonly RegisteredClient[] {
    return this.clients;
  }

  /**
   * Look up by id ("claude-desktop") or display name ("Claude Desktop"),
   * case-insensitively.
   */
  get(nameOrId: string): RegisteredClient | undefined {
    const wanted = nameOrId.trim().toLowerCase();
    return this.clients.find(
      (c) => c.id.toLowerCase() === wanted || c.name.toLowerCase() === wanted
    );
  }

  require(nameOrId: string): RegisteredClient {
    const client = this.get(nameOrId);
    if (!client) {
      const known = this.clients.map((c) => c.id).join(", ");
      throw new NotFoundError(`Unknown client "${nameOrId}" (known: ${known})`);
    }
    return client;
  }

  detectInstalled(): RegisteredClient[] {
    return this.clients.filter((c) => c.isInstalled());
  }
}

export function createDefaultRegistry(ctx: PlatformContext): ClientRegistry {
  const registry = new ClientRegistry();
  for (const definition of CLIENT_DEFINITIONS) {
    registry.register(new JsonFileClient(definition, ctx));
  }
  return registry;
}
