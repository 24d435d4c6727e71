import axios, { AxiosInstance } from "axios";
import { Credentials } from "../../shared/types/common";

export const LOOKING_FOR_PARTY_PATH = "/api/v3/looking-for-party";
export const PARTY_INVITE_PATH = "/api/v3/groups/party/invite";

export interface HabiticaClientSettings {
  baseUrl: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export function clientHeaders({ apiUser, apiKey }: Credentials): Record<string, string> {
  return {
    "content-type": "application/json",
    "x-client": `${apiUser}-PartyUp`,
    "x-api-user": apiUser,
    "x-api-key": apiKey,
  };
}

// one authenticated instance per run
export function createHabiticaClient(credentials: Credentials, settings: HabiticaClientSettings): AxiosInstance {
  return axios.create({
    baseURL: settings.baseUrl,
    timeout: settings.timeoutMs,
    headers: clientHeaders(credentials),
    signal: settings.signal,
    // the listing reports failures through its success flag
    validateStatus: () => true,
  });
}
