/**
 * Role Ping Ledger — scripts/deploy-commands.ts
 * WHAT: CLI helper to bulk overwrite slash commands, guild-scoped when GUILD_ID is set, global otherwise.
 * FLOWS: build commands → REST PUT → GET back and verify every command name is present
 * DOCS:
 *  - REST client / Routes: https://discord.js.org/#/docs/rest/main/class/REST
 *  - Bulk overwrite commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-global-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { env } from "../src/lib/env.js";
import { logger } from "../src/lib/logger.js";
import { buildCommands } from "../src/commands/buildCommands.js";

function namesOf(body: unknown): string[] {
  if (!Array.isArray(body)) return [];
  return body.flatMap((entry: unknown) => {
    if (entry === null || typeof entry !== "object") return [];
    const name: unknown = Reflect.get(entry, "name");
    return typeof name === "string" ? [name] : [];
  });
}

export async function deployCommands(appId: string, token: string, guildId?: string): Promise<boolean> {
  const rest = new REST({ version: "10" }).setToken(token);
  const commands = buildCommands();
  const route = guildId ? Routes.applicationGuildCommands(appId, guildId) : Routes.applicationCommands(appId);
  const scope = guildId ? `guild ${guildId}` : "global";

  logger.info({ scope, count: commands.length }, "[deploy] overwriting commands");
  await rest.put(route, { body: commands });

  // Global commands can take a while to show up in clients, but the API returns them immediately
  const registered = new Set(namesOf(await rest.get(route)));
  const missing = commands.map((c) => c.name).filter((name) => !registered.has(name));
  if (missing.length > 0) {
    logger.error({ scope, missing }, "[deploy] commands missing after overwrite");
    return false;
  }

  logger.info({ scope, commands: [...registered].sort() }, "[deploy] commands synced");
  return true;
}

async function main(): Promise<void> {
  if (!env.CLIENT_ID) {
    logger.error("[deploy] CLIENT_ID is required to register commands");
    process.exit(1);
  }
  const ok = await deployCommands(env.CLIENT_ID, env.DISCORD_TOKEN, env.GUILD_ID);
  process.exit(ok ? 0 : 1);
}

main().catch((err: unknown) => {
  logger.error({ err }, "[deploy] failed");
  process.exit(1);
});
