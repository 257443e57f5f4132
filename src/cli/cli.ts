#!/usr/bin/env node

async function main() {
  const command = process.argv[2];

  if (command === "start") {
    const { runStart } = await import("./start.js");
    await runStart();
  } else if (command === "diagnose") {
    const { runDiagnose } = await import("./diagnose.js");
    await runDiagnose();
  } else {
    console.error("introspect-gateway");
    console.error("");
    console.error("Usage:");
    console.error("  introspect-gateway start     — Register route groups and listen on $PORT");
    console.error("  introspect-gateway diagnose  — Load every route group and report failures");
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
