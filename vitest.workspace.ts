import { defineWorkspace } from "vitest/config";

export default defineWorkspace(["packages/greeter", "packages/cli"]);
