import { runCli } from "@/interface/cli";

(async () => {
  const exitCode = await runCli(process.argv);
  process.exit(exitCode);
})();
