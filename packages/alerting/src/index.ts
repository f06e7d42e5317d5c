export * from "./alert-gate.js";
export * from "./alert-ledger.js";
export * from "./alert-manager.js";
export * from "./notifier.js";
export * from "./screenshot-writer.js";
