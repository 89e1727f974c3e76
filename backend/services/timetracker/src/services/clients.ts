// backend/services/timetracker/src/services/clients.ts
import { UNASSIGNED_ID, type ClientRecord } from "../store/RecordStore";
import type { ClientInput } from "../validators/client.dto";
import type { ClientView } from "../contracts/views";
import { noRefs, type ResourceDefinition } from "./resourceService";

export const clientResource: ResourceDefinition<
  ClientRecord,
  ClientInput,
  ClientView,
  undefined
> = {
  label: "Client",
  set: (store) => store.clients,
  resolve: noRefs,
  create: (input) => ({ id: UNASSIGNED_ID, name: input.name }),
  apply: (target, input) => {
    target.name = input.name;
  },
  project: async (c) => ({ id: c.id, name: c.name }),
};
