// services/timeTrackerService.ts
import type { AxiosInstance } from "axios";
import { createApi } from "./api";
import type {
  ClientInput,
  ClientView,
  PagedResult,
  ProjectInput,
  ProjectView,
  TimeEntryInput,
  TimeEntryView,
  UserInput,
  UserView,
} from "../shared/interfaces/TimeTracker";

export interface ResourceClient<I, V> {
  list(page?: number, size?: number): Promise<PagedResult<V>>;
  get(id: number): Promise<V>;
  create(input: I): Promise<V>;
  update(id: number, input: I): Promise<V>;
  remove(id: number): Promise<void>;
}

function resourceClient<I, V>(api: AxiosInstance, path: string): ResourceClient<I, V> {
  return {
    async list(page, size) {
      const res = await api.get<PagedResult<V>>(path, { params: { page, size } });
      return res.data;
    },
    async get(id) {
      const res = await api.get<V>(`${path}/${id}`);
      return res.data;
    },
    async create(input) {
      const res = await api.post<V>(path, input);
      return res.data;
    },
    async update(id, input) {
      const res = await api.put<V>(`${path}/${id}`, input);
      return res.data;
    },
    async remove(id) {
      await api.delete(`${path}/${id}`);
    },
  };
}

export type TimeTrackerClient = {
  /** Fetches a demo token and uses it for every later call. */
  signIn(name: string, admin?: boolean): Promise<string>;
  signOut(): void;
  users: ResourceClient<UserInput, UserView>;
  clients: ResourceClient<ClientInput, ClientView>;
  projects: ResourceClient<ProjectInput, ProjectView>;
  timeEntries: ResourceClient<TimeEntryInput, TimeEntryView> & {
    forMonth(userId: number, year: number, month: number): Promise<TimeEntryView[]>;
  };
};

/** `baseURL` is the service root; API calls go to `${baseURL}/api/v{apiVersion}`. */
export function createTimeTrackerClient(baseURL: string, apiVersion = 2): TimeTrackerClient {
  let token: string | undefined;
  const root = createApi({ baseURL });
  const api = createApi({
    baseURL: `${baseURL.replace(/\/+$/, "")}/api/v${apiVersion}`,
    token: () => token,
  });
  const timeEntries = resourceClient<TimeEntryInput, TimeEntryView>(api, "/time-entries");

  return {
    async signIn(name, admin = false) {
      const res = await root.get<string>("/get-token", {
        params: { name, admin: String(admin) },
        responseType: "text",
      });
      token = res.data;
      return token;
    },
    signOut() {
      token = undefined;
    },
    users: resourceClient(api, "/users"),
    clients: resourceClient(api, "/clients"),
    projects: resourceClient(api, "/projects"),
    timeEntries: {
      ...timeEntries,
      async forMonth(userId, year, month) {
        const res = await api.get<TimeEntryView[]>(
          `/time-entries/user/${userId}/${year}/${month}`
        );
        return res.data;
      },
    },
  };
}
