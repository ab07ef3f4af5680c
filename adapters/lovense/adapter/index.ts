import { runAdapter, type AdapterFactory } from "@toylink/adapter-sdk";
import { LovenseAdapter } from "./adapter.js";
import { CoordinatorRegistry } from "./callback-router.js";

// One registry per process: the callback receiver routes by user id to
// whichever coordinator registered it.
const registry = new CoordinatorRegistry();

const createLovenseAdapter: AdapterFactory = (config) => new LovenseAdapter(config, { registry });
export default createLovenseAdapter;

// Standalone entry point: start the SDK harness
runAdapter(createLovenseAdapter);
