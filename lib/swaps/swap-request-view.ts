/**
 * Swap requests as returned by the API: the record plus the participants'
 * public profiles, loaded in one batch query. A participant the actor may not
 * view is embedded as null.
 */

import type { DbAdapter } from "@/lib/db/adapter";
import { getUsersByIds } from "@/lib/db/queries";
import type { ActorIdentity } from "@/lib/auth";
import { canViewUser } from "@/lib/access";
import type { PublicProfile, SwapRequestRecord, SwapRequestView, UserRecord } from "@/lib/schemas";
import { toPublicProfile } from "@/lib/accounts/profile-view";

function visibleProfile(actor: ActorIdentity, user: UserRecord | undefined): PublicProfile | null {
  return user && canViewUser(actor, user) ? toPublicProfile(user) : null;
}

export async function toSwapRequestViews(
  db: DbAdapter,
  actor: ActorIdentity,
  requests: SwapRequestRecord[]
): Promise<SwapRequestView[]> {
  const users = await getUsersByIds(
    db,
    requests.flatMap((r) => [r.requester_id, r.recipient_id])
  );
  return requests.map((r) => ({
    ...r,
    requester: visibleProfile(actor, users.get(r.requester_id)),
    recipient: visibleProfile(actor, users.get(r.recipient_id)),
  }));
}

export async function toSwapRequestView(
  db: DbAdapter,
  actor: ActorIdentity,
  request: SwapRequestRecord
): Promise<SwapRequestView> {
  const [view] = await toSwapRequestViews(db, actor, [request]);
  return view;
}
