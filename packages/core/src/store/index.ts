export {
  RecordStore,
  fromStored,
  toStored,
  recordAt,
  type RecordStoreOptions,
} from "./record-store.js";
