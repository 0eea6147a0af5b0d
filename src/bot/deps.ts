import type { RiskService } from "../service.js";
import type { ScanStore } from "./scanStore.js";

export type BotDeps = {
  service: RiskService;
  scans: ScanStore;
  reportsDir: string;
  historyEnabled: boolean;
};
