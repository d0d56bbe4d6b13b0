import { useSyncExternalStore } from "react";
import type { AssignmentStore } from "../domain/store";

export function useAssignments(store: AssignmentStore) {
  return useSyncExternalStore(store.subscribe, store.getSnapshot);
}
