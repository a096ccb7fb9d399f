import { buildServer } from "./app";

const app = buildServer();

async function main(): Promise<void> {
  const port = Number(process.env.PORT ?? 3102);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen({ port, host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
