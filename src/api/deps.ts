import { Services } from "../services";
import { Stores } from "../stores";
import { SessionRegistry } from "./sessions";

/**
 * What the routers are built from
 */
export interface ApiDeps {
  stores: Stores;
  services: Services;
  sessions: SessionRegistry;
}
