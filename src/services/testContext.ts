/**
 * Test support: a ServiceContext over a fresh temporary data directory,
 * an in-memory artifact storage and a fixed clock.
 */

import fs from "fs";
import os from "os";
import path from "path";
import { openStores } from "../stores";
import { ArtifactStorage } from "../storage/artifactStorage";
import { ServiceContext } from "./context";
import { createServices, Services } from "./index";
import { Role, User } from "../domain/user";

export class MemoryArtifactStorage implements ArtifactStorage {
  readonly files = new Map<string, Buffer>();
  failNextSave = false;

  async save(name: string, bytes: Buffer): Promise<string> {
    if (this.failNextSave) {
      this.failNextSave = false;
      throw new Error("disk full");
    }
    const reference = `memory/${name}`;
    this.files.set(reference, bytes);
    return reference;
  }

  async remove(reference: string): Promise<boolean> {
    return this.files.delete(reference);
  }

  async list(): Promise<string[]> {
    return [...this.files.keys()];
  }
}

export const FIXED_NOW = new Date("2025-03-10T12:00:00.000Z");

export interface TestEnv {
  dataDir: string;
  ctx: ServiceContext;
  storage: MemoryArtifactStorage;
  services: Services;
  cleanup(): void;
}

export function createTestEnv(overrides: Partial<ServiceContext> = {}): TestEnv {
  const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "coursework-test-"));
  const storage = new MemoryArtifactStorage();
  const ctx: ServiceContext = {
    stores: openStores(dataDir),
    storage,
    allowSelfEnrollment: false,
    maxUploadBytes: 1024,
    now: () => FIXED_NOW,
    ...overrides,
  };

  return {
    dataDir,
    ctx,
    storage,
    services: createServices(ctx),
    cleanup: () => fs.rmSync(dataDir, { recursive: true, force: true }),
  };
}

/**
 * Register a user with a predictable username/email and password "secret-pw"
 */
export function registerUser(services: Services, username: string, role: Role): User {
  return services.accounts.register({
    username,
    email: `${username}@example.com`,
    password: "secret-pw",
    firstName: username.charAt(0).toUpperCase() + username.slice(1),
    lastName: "Tester",
    role,
  });
}
