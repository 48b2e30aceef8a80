import "reflect-metadata";

import fs from "fs";
import path from "path";

import { ITestConnection } from "./helpers/ITestConnection";
import { TestBackend } from "./helpers/TestBackend";

type TestFunction = (connection: ITestConnection) => Promise<void>;

const FEATURES: string = path.join(__dirname, "features");

const iterate = (location: string): string[] =>
  fs
    .readdirSync(location, { withFileTypes: true })
    .flatMap((entry) => {
      const next: string = path.join(location, entry.name);
      if (entry.isDirectory()) return iterate(next);
      return entry.name.endsWith(".ts") ? [next] : [];
    })
    .sort();

const isTestFunction = (key: string, value: unknown): value is TestFunction =>
  key.startsWith("test_") && typeof value === "function";

let backend: TestBackend | null = null;

beforeAll(async () => {
  backend = await TestBackend.open();
});
afterAll(async () => {
  if (backend !== null) await backend.close();
});

// every exported `test_*` function of the features directory becomes a test
for (const file of iterate(FEATURES)) {
  const loaded: unknown = require(file);
  if (typeof loaded !== "object" || loaded === null) continue;

  describe(path.relative(FEATURES, file), () => {
    for (const [key, value] of Object.entries(loaded))
      if (isTestFunction(key, value))
        test(key, async () => {
          if (backend === null) throw new Error("backend is not opened");
          await value(backend.connection());
        });
  });
}
