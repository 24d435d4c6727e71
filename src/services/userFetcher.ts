import { AxiosInstance } from "axios";
import { LOOKING_FOR_PARTY_PATH } from "../infrastructure/habitica/client";
import { toTransportError } from "../infrastructure/habitica/errors";
import { listingResponseSchema, toCandidate } from "../infrastructure/habitica/schemas";
import { Candidate } from "../shared/types/candidate";
import { ProtocolError } from "../shared/utils/errors";

/**
 * Reads the looking-for-party listing once.
 * Candidates come back in the order the service returned them.
 */
export async function fetchCandidates(client: AxiosInstance): Promise<Candidate[]> {
  let body: unknown;
  try {
    const response = await client.get<unknown>(LOOKING_FOR_PARTY_PATH);
    body = response.data;
  } catch (error) {
    throw toTransportError(error, "Fetching users");
  }

  if (typeof body === "string") {
    throw new ProtocolError("Response body is not valid JSON");
  }

  const parsed = listingResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProtocolError("Response body does not match the expected format", parsed.error.flatten());
  }

  if (!parsed.data.success) {
    throw new ProtocolError("Request failed, please check your API user and key.", {
      message: parsed.data.message,
    });
  }

  return (parsed.data.data ?? []).map(toCandidate);
}
