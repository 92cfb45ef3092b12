export function readBaseUrl(argv: string[], env: NodeJS.ProcessEnv = process.env) {
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg?.startsWith("--base-url=")) {
      return arg.slice("--base-url=".length).replace(/\/+$/, "");
    }
    if (arg === "--base-url") {
      const value = argv[index + 1];
      if (!value) {
        throw new Error("Usage: npm run smoke -- --base-url=<http://host:port>");
      }
      return value.replace(/\/+$/, "");
    }
  }

  return (env.EVAL_API_BASE_URL ?? "http://localhost:3001").replace(/\/+$/, "");
}
