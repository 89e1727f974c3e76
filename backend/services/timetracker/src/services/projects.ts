// backend/services/timetracker/src/services/projects.ts
import {
  UNASSIGNED_ID,
  type ClientRecord,
  type ProjectRecord,
} from "../store/RecordStore";
import type { ProjectInput } from "../validators/project.dto";
import type { ProjectView } from "../contracts/views";
import type { ResourceDefinition } from "./resourceService";

type ProjectRefs = { client: ClientRecord };

export const projectResource: ResourceDefinition<
  ProjectRecord,
  ProjectInput,
  ProjectView,
  ProjectRefs
> = {
  label: "Project",
  set: (store) => store.projects,
  resolve: async (store, input) => {
    const client = await store.clients.find(input.clientId);
    return client
      ? { ok: true, refs: { client } }
      : { ok: false, detail: `Client ${input.clientId} not found` };
  },
  create: (input, { client }) => ({
    id: UNASSIGNED_ID,
    name: input.name,
    clientId: client.id,
  }),
  // The owning client may be reassigned.
  apply: (target, input, { client }) => {
    target.name = input.name;
    target.clientId = client.id;
  },
  project: async (p, ctx) => {
    const client = await ctx.client(p.clientId);
    return {
      id: p.id,
      name: p.name,
      clientId: client.id,
      clientName: client.name,
    };
  },
};
