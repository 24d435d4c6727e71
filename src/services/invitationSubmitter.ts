import { AxiosInstance } from "axios";
import { PARTY_INVITE_PATH } from "../infrastructure/habitica/client";
import { toTransportError } from "../infrastructure/habitica/errors";
import { InvitationBatch, InviteRequest } from "../shared/types/invitation";
import { LogSink, logger } from "../shared/utils/logger";

// sends one batch invite; returns how many ids were submitted
export async function submitInvitations(
  client: AxiosInstance,
  uuids: InvitationBatch,
  log: LogSink = logger,
): Promise<number> {
  if (uuids.length === 0) {
    log.info("No users to invite at this time.");
    return 0;
  }

  const body: InviteRequest = { uuids: [...uuids] };

  // the response is read, but its status and body are not interpreted
  try {
    const response = await client.post<unknown>(PARTY_INVITE_PATH, body);
    log.debug(`Invite request answered with status ${response.status}.`);
  } catch (error) {
    throw toTransportError(error, "Inviting users");
  }

  log.info(`Successfully invited ${uuids.length} users!`);
  return uuids.length;
}
