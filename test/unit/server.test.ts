import { expect } from "chai";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { createServer, type ServerOptions } from "../../src/server.js";
import { seededRandom } from "../../src/engine/random.js";

async function connect(options: ServerOptions = {}): Promise<Client> {
  const server = createServer({ random: seededRandom(1), ...options });
  const client = new Client({ name: "epiboard-test", version: "0.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  return client;
}

async function call(client: Client, name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
  return CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
}

function textOf(result: CallToolResult): string {
  return result.content.map(c => (c.type === "text" ? c.text : "")).join("");
}

describe("MCP server", () => {
  let client: Client;
  const originalError = console.error;

  beforeEach(async () => {
    console.error = () => undefined;
    client = await connect();
  });

  afterEach(async () => {
    await client.close();
    console.error = originalError;
  });

  it("should list the game tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map(t => t.name).sort()).to.deep.equal([
      "advance_turn", "get_card_catalog", "get_state", "play_card", "start_game",
    ]);
  });

  it("should ask for a game before advancing", async () => {
    const result = await call(client, "advance_turn");
    expect(textOf(result)).to.equal("No game in progress. Call start_game first.");
  });

  it("should start a game on the bundled board", async () => {
    const body = textOf(await call(client, "start_game"));
    expect(body.startsWith("# Game started\n\n## Turn 1/60\n")).to.equal(true);
    expect(body).to.include("- Treasury: 30\n");
    expect(body).to.include("| North Works (`north-works`) | factory | 520 | 0 | 120 | working |");
  });

  it("should advance several rounds at once", async () => {
    await call(client, "start_game");
    const body = textOf(await call(client, "advance_turn", { rounds: 2 }));
    expect(body.startsWith("## Turn 3/60\n")).to.equal(true);
    expect(body).to.include("### Since last turn");
  });

  it("should play a tax card", async () => {
    await call(client, "start_game");
    const body = textOf(await call(client, "play_card", { card: "taxing", blockId: "north-works" }));
    // floor(120 * 0.05)
    expect(body).to.include("- Collected: 6\n");
    expect(body).to.include("- Treasury: 36\n");
  });

  it("should explain a card that does not apply", async () => {
    await call(client, "start_game");
    const result = await call(client, "play_card", { card: "start_working", blockId: "old-town" });
    expect(textOf(result)).to.equal("Resume Work cannot be played on a housing block.");
  });

  it("should describe one block", async () => {
    await call(client, "start_game", { godView: true });
    const body = textOf(await call(client, "get_state", { blockId: "market-row" }));
    expect(body).to.include("- Sends to: old-town, st-mary, south-mill, isolation-camp");
    expect(body).to.include("- Cohorts: symptomatic 0, incubating 4");
  });

  it("should list valid ids for an unknown block", async () => {
    await call(client, "start_game");
    const body = textOf(await call(client, "get_state", { blockId: "nowhere" }));
    expect(body.split("\n")[0]).to.equal("Block not found: nowhere");
  });

  it("should list the card catalog", async () => {
    const body = textOf(await call(client, "get_card_catalog"));
    expect(body).to.include("- **Levy Tax** (`taxing`, cost 0): ");
  });

  it("should report a board that cannot be loaded", async () => {
    await client.close();
    client = await connect({ dataDir: "/nonexistent/epiboard-data" });
    const result = await call(client, "start_game");
    expect(result.isError).to.equal(true);
    expect(textOf(result).startsWith("Could not load the board.")).to.equal(true);
  });

  it("should report a card catalog that cannot be loaded", async () => {
    await client.close();
    client = await connect({ dataDir: "/nonexistent/epiboard-data" });
    const result = await call(client, "get_card_catalog");
    expect(result.isError).to.equal(true);
    expect(textOf(result).split("\n")[0]).to.equal("Could not load the card catalog.");
  });
});
