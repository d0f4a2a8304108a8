import { requireGoogleCredentials, resolveSheetId, type AppEnv } from '../config.js';
import { SheetConfigStore, type ConfigStore } from './configStore.js';
import { GoogleSheetGateway } from './googleSheetGateway.js';
import { SheetItemStore, type ItemStore } from './itemStore.js';
import { OperationLog } from './operationLog.js';
import { ResearchLog } from './researchLog.js';
import { MemorySheetGateway, type SheetGateway } from './sheetGateway.js';

export interface Stores {
  items: ItemStore;
  config: ConfigStore;
  operations: OperationLog;
  research: ResearchLog;
}

export function storesOn(gateway: SheetGateway): Stores {
  return {
    items: new SheetItemStore(gateway),
    config: new SheetConfigStore(gateway),
    operations: new OperationLog(gateway),
    research: new ResearchLog(gateway),
  };
}

export function openStores(env: AppEnv): Stores {
  if (env.STORE_BACKEND === 'memory') {
    console.log('   [store] ⚠️  STORE_BACKEND=memory, nothing will survive a restart');
    return storesOn(new MemorySheetGateway());
  }
  const gateway = new GoogleSheetGateway(resolveSheetId(env), requireGoogleCredentials(env));
  return storesOn(gateway);
}
