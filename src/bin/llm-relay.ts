#!/usr/bin/env node
import { loadConfig } from "../core/config.js";
import { createRuntime, seedFromEnv, type Runtime } from "../core/bootstrap.js";
import { createConsoleLogger } from "../telemetry/events.js";
import { createGatewayHandler } from "../server/handler.js";
import { createNodeServer, listen } from "../server/node.js";
import { errorMessage } from "../errors.js";
import { RELAY_VERSION } from "../version.js";

interface CliArgs {
  command?: string;
  provider?: string;
  model: string;
  query: string;
  config?: string;
  stream: boolean;
  help: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const o: CliArgs = { model: "", query: "", stream: false, help: false };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "-p" || a === "--provider") o.provider = argv[++i];
    else if (a === "-m" || a === "--model") o.model = argv[++i] ?? "";
    else if (a === "-q" || a === "--query") o.query = argv[++i] ?? "";
    else if (a === "-c" || a === "--config") o.config = argv[++i];
    else if (a === "-s" || a === "--stream") o.stream = true;
    else if (a === "-h" || a === "--help") o.help = true;
    else if (!o.command && !a.startsWith("-")) o.command = a;
  }
  return o;
}

const USAGE = `llm-relay ${RELAY_VERSION}

Usage:
  llm-relay serve [-c <config>]
  llm-relay chat -m <model> -q <prompt> [-p <provider>] [-s] [-c <config>]
  llm-relay models [-p <provider>] [-c <config>]

Config is read from llm-relay.config.json (searched upwards from the working
directory) and overridden by RELAY_HOST, RELAY_PORT, RELAY_BASE_PATH,
RELAY_ENCRYPTION_KEY, DATABASE_URL, OLLAMA_BASE_URL and RELAY_LOG_LEVEL.
Without DATABASE_URL, upstream credentials come from OPENAI_API_KEY,
ANTHROPIC_API_KEY, GOOGLE_API_KEY and OLLAMA_BASE_URL, and the gateway
accepts RELAY_CLIENT_TOKEN (or a generated token) as its bearer token.
`;

async function serve(runtime: Runtime, ownerToken?: string): Promise<void> {
  const handler = createGatewayHandler({
    gateway: runtime.gateway,
    credentials: runtime.credentialService,
    basePath: runtime.config.server.basePath
  });
  const server = createNodeServer(handler);
  const { host, port } = await listen(server, runtime.config.server);
  console.log(`llm-relay listening on http://${host}:${port}${runtime.config.server.basePath}`);
  if (ownerToken && !process.env.RELAY_CLIENT_TOKEN) console.log(`client token: ${ownerToken}`);

  const shutdown = () => {
    server.close(() => {
      runtime.close().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error(errorMessage(error));
          process.exit(1);
        }
      );
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const command = args.command ?? "";
  if (args.help || !["serve", "chat", "models"].includes(command) || (command === "chat" && (!args.model || !args.query))) {
    console.log(USAGE);
    return args.help ? 0 : 1;
  }

  const { config } = loadConfig({ file: args.config });
  const runtime = createRuntime(config, { onEvent: createConsoleLogger(config.logLevel) });

  // The CLI acts as a single local owner unless a database supplies real ones
  const ownerId = process.env.RELAY_OWNER_ID ?? "local";
  const seeded = runtime.ephemeral ? await seedFromEnv(runtime, process.env, ownerId) : undefined;

  if (command === "serve") {
    await serve(runtime, seeded?.clientToken);
    return -1;
  }

  try {
    if (command === "models") {
      for (const m of await runtime.gateway.listModels(ownerId, { provider: args.provider })) {
        console.log(`${m.provider}\t${m.id}`);
      }
      return 0;
    }

    const req = { model: args.model, messages: [{ role: "user" as const, content: args.query }] };
    if (args.stream) {
      const { fragments } = await runtime.gateway.openStream(ownerId, req, { provider: args.provider });
      for await (const fragment of fragments) process.stdout.write(fragment);
      process.stdout.write("\n");
      await fragments.done;
    } else {
      const { result } = await runtime.gateway.complete(ownerId, req, { provider: args.provider });
      console.log(result.content);
    }
    return 0;
  } finally {
    await runtime.close();
  }
}

main().then(
  (code) => {
    if (code >= 0) process.exitCode = code;
  },
  (e: unknown) => {
    console.error(errorMessage(e));
    process.exit(3);
  }
);
