// backend/services/timetracker/src/services/users.ts
import { UNASSIGNED_ID, type UserRecord } from "../store/RecordStore";
import type { UserInput } from "../validators/user.dto";
import type { UserView } from "../contracts/views";
import { noRefs, type ResourceDefinition } from "./resourceService";

export const userResource: ResourceDefinition<
  UserRecord,
  UserInput,
  UserView,
  undefined
> = {
  label: "User",
  set: (store) => store.users,
  resolve: noRefs,
  create: (input) => ({
    id: UNASSIGNED_ID,
    name: input.name,
    hourRate: input.hourRate,
  }),
  // Existing time entries keep the rate they were booked at.
  apply: (target, input) => {
    target.name = input.name;
    target.hourRate = input.hourRate;
  },
  project: async (u) => ({ id: u.id, name: u.name, hourRate: u.hourRate }),
};
