import { BackupService } from "./backup/backupService";
import { DailyLogService } from "./dailyLogService";
import { ProductService } from "./productService";
import { DEFAULT_SETTINGS, NutritionSettings } from "./settings";
import type { NutritionStore } from "./store/types";
import { TemplateService } from "./templateService";

export interface Services {
  products: ProductService;
  dailyLogs: DailyLogService;
  templates: TemplateService;
  backup: BackupService;
}

export function createServices(
  store: NutritionStore,
  settings: NutritionSettings = DEFAULT_SETTINGS,
  now: () => Date = () => new Date()
): Services {
  return {
    products: new ProductService(store, now),
    dailyLogs: new DailyLogService(store, settings, now),
    templates: new TemplateService(store, settings, now),
    backup: new BackupService(store, { now }),
  };
}
