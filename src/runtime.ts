// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Process-wide runtime: config, catalog, sink, controller and the session
 * registry, built once on first use and shared by the route handlers.
 */

import { join } from "node:path";
import { type StudyConfig, loadStudyConfig } from "./config/index.js";
import type { Catalog } from "./content/catalog.js";
import { computeCatalogHash } from "./content/hasher.js";
import { loadCatalog } from "./content/loader.js";
import { NavigationController } from "./navigation/controller.js";
import { createResponseSink } from "./responses/factory.js";
import { SessionRegistry } from "./session/registry.js";

export interface StudyRuntime {
  config: StudyConfig;
  catalog: Catalog;
  catalogHash: string;
  controller: NavigationController;
  registry: SessionRegistry;
}

let instance: StudyRuntime | null = null;
let initPromise: Promise<StudyRuntime> | null = null;

export function getConfigDir(): string {
  return process.env.CONFIG_DIR ?? join(process.cwd(), "config");
}

export async function createStudyRuntime(configDir: string = getConfigDir()): Promise<StudyRuntime> {
  const config = await loadStudyConfig(configDir);
  const catalog = await loadCatalog(config.content.dir, {
    defaultWatchSeconds: config.study.defaultWatchSeconds,
  });
  const controller = new NavigationController({
    catalog,
    sink: createResponseSink(config.sink),
    settings: config.study,
  });
  return {
    config,
    catalog,
    catalogHash: computeCatalogHash(catalog),
    controller,
    registry: new SessionRegistry(config.session.ttlSeconds),
  };
}

/**
 * Returns the shared runtime, loading it on the first call. A failed load is
 * not cached, so the next request retries.
 */
export function getStudyRuntime(): Promise<StudyRuntime> {
  if (instance) {
    return Promise.resolve(instance);
  }

  if (initPromise) {
    return initPromise;
  }

  initPromise = createStudyRuntime().then(
    (runtime) => {
      instance = runtime;
      initPromise = null;
      return runtime;
    },
    (error: unknown) => {
      initPromise = null;
      throw error;
    },
  );

  return initPromise;
}

/**
 * Resets the singleton.
 * Used in tests to swap runtimes between suites.
 */
export function resetStudyRuntime(): void {
  instance = null;
  initPromise = null;
}
