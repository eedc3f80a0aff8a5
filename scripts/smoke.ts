import "dotenv/config";

const baseURL = process.env.SMOKE_API_URL ?? "http://localhost:3000";
const userId = process.env.SMOKE_USER_ID ?? `smoke-${Date.now()}`;
const endpoint = process.env.SMOKE_ENDPOINT ?? "agent/route";
const messages = (process.env.SMOKE_MESSAGES ?? "Tengo fiebre alta y dolor de cabeza|Ahora también siento rigidez de cuello")
  .split("|")
  .map((message) => message.trim())
  .filter((message) => message.length > 0);

async function send(message: string): Promise<void> {
  const response = await fetch(`${baseURL.replace(/\/$/, "")}/${endpoint}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ user_id: userId, message }),
  });

  const text = await response.text();
  console.log(`> ${message}`);
  console.log(`< ${response.status} ${text}`);

  if (!response.ok) {
    throw new Error(`request failed with status ${response.status}`);
  }
}

async function main(): Promise<void> {
  console.log(`user ${userId} -> ${baseURL}/${endpoint}`);
  for (const message of messages) {
    await send(message);
  }
}

main().catch((error: unknown) => {
  console.error(`smoke failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
