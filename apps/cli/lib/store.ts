import { TableStore } from "@ipa-kit/tables";
import { getDataPaths } from "./config.js";

let store: TableStore | null = null;

export function getStore(): TableStore {
  if (!store) {
    const { dataDir } = getDataPaths();
    store = new TableStore({ dataDir });
  }

  return store;
}
