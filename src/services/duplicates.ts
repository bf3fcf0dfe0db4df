import { parseTimestamp } from "../lib/dates";
import type { Booking, DuplicateDetectionResult, Logger } from "../types/refund";
import { isUsedStatus, toBooking } from "./bookingRecord";

/** Overlap as a share of the shorter booking, clamped to [0, 100]; 0 when either window is unusable. */
export const calculateOverlapPercent = (a: Booking, b: Booking): number => {
  const startA = parseTimestamp(a.start_time);
  const endA = parseTimestamp(a.end_time);
  const startB = parseTimestamp(b.start_time);
  const endB = parseTimestamp(b.end_time);
  if (startA === null || endA === null || startB === null || endB === null) {
    return 0;
  }
  const shorter = Math.min(endA - startA, endB - startB);
  if (shorter <= 0) {
    return 0;
  }
  const overlap = Math.max(0, Math.min(endA, endB) - Math.max(startA, startB));
  return Math.min(100, Math.max(0, (overlap / shorter) * 100));
};

const isDuplicatePair = (a: Booking, b: Booking) =>
  a.location.id === b.location.id && calculateOverlapPercent(a, b) > 0;

/** Connected components over the duplicate relation, so A~B and B~C put all three together. */
export const clusterDuplicates = (bookings: Booking[]): Booking[][] => {
  const parent = bookings.map((_, index) => index);
  const find = (index: number): number => {
    let root = index;
    while (parent[root] !== root) {
      root = parent[root];
    }
    parent[index] = root;
    return root;
  };

  for (let i = 0; i < bookings.length; i += 1) {
    for (let j = i + 1; j < bookings.length; j += 1) {
      if (isDuplicatePair(bookings[i], bookings[j])) {
        parent[find(j)] = find(i);
      }
    }
  }

  const groups = new Map<number, Booking[]>();
  bookings.forEach((booking, index) => {
    const root = find(index);
    groups.set(root, [...(groups.get(root) ?? []), booking]);
  });
  return [...groups.values()].filter((group) => group.length >= 2);
};

const result = (
  fields: Pick<DuplicateDetectionResult, "has_duplicates" | "duplicate_count" | "action" | "explanation"> &
    Partial<DuplicateDetectionResult>,
  all_booking_ids: string[]
): DuplicateDetectionResult => ({
  used_booking_id: null,
  unused_booking_id: null,
  duplicate_booking_ids: [],
  ...fields,
  all_booking_ids,
});

const resolvePair = (pair: [Booking, Booking], allIds: string[]): DuplicateDetectionResult => {
  const [first, second] = pair;
  const ids = [first.id, second.id];
  const base = { has_duplicates: true, duplicate_count: 2, duplicate_booking_ids: ids };
  const firstUsed = isUsedStatus(first.status);
  const secondUsed = isUsedStatus(second.status);

  if (firstUsed && secondUsed) {
    return result(
      {
        ...base,
        action: "escalate",
        explanation: `Found 2 duplicate bookings (IDs: ${ids.join(", ")}) and both were used. Escalate to human review.`,
      },
      allIds
    );
  }

  if (firstUsed !== secondUsed) {
    const used = firstUsed ? first : second;
    const unused = firstUsed ? second : first;
    return result(
      {
        ...base,
        action: "refund_duplicate",
        used_booking_id: used.id,
        unused_booking_id: unused.id,
        explanation: `Found 2 duplicate bookings. Booking ${used.id} was used (status: ${used.status ?? "unknown"}), booking ${unused.id} was unused (status: ${unused.status ?? "unknown"}). Recommend refunding unused booking.`,
      },
      allIds
    );
  }

  const firstStart = parseTimestamp(first.start_time);
  const secondStart = parseTimestamp(second.start_time);
  if (firstStart === null || secondStart === null || firstStart === secondStart) {
    return result(
      {
        ...base,
        action: "escalate",
        explanation: `Found 2 duplicate bookings (IDs: ${ids.join(", ")}) but could not determine which to keep. Escalate to human review.`,
      },
      allIds
    );
  }

  const kept = firstStart > secondStart ? first : second;
  const refunded = kept === first ? second : first;
  return result(
    {
      ...base,
      action: "refund_duplicate",
      used_booking_id: kept.id,
      unused_booking_id: refunded.id,
      explanation: `Found 2 duplicate bookings and neither was used. Keeping the later booking ${kept.id} and refunding ${refunded.id}.`,
    },
    allIds
  );
};

/** Pure: decides whether a customer's bookings contain a duplicate and which one to refund. */
export const analyzeDuplicateBookings = (bookings: unknown[], logger?: Logger): DuplicateDetectionResult => {
  const valid: Booking[] = [];
  bookings.forEach((entry, index) => {
    const booking = toBooking(entry);
    if (booking) {
      valid.push(booking);
    } else {
      logger?.warn({ index }, "Skipping malformed booking");
    }
  });
  const allIds = valid.map((booking) => booking.id);

  if (valid.length <= 1) {
    return result(
      {
        has_duplicates: false,
        duplicate_count: valid.length,
        action: "deny",
        explanation: `Found ${valid.length} booking(s). No duplicates detected.`,
      },
      allIds
    );
  }

  const clusters = clusterDuplicates(valid);
  if (clusters.length === 0) {
    const sharedLocation = valid.some((booking, index) =>
      valid.slice(index + 1).some((other) => other.location.id === booking.location.id)
    );
    return result(
      {
        has_duplicates: false,
        duplicate_count: 0,
        action: "deny",
        explanation: sharedLocation
          ? `Found ${valid.length} bookings but no duplicates (no time overlap at the same location).`
          : `Found ${valid.length} bookings but no duplicates (different locations).`,
      },
      allIds
    );
  }

  const largest = clusters.reduce((max, cluster) => (cluster.length > max.length ? cluster : max));
  if (largest.length >= 3 || clusters.length > 1) {
    const ids = clusters.flat().map((booking) => booking.id);
    return result(
      {
        has_duplicates: true,
        duplicate_count: largest.length >= 3 ? largest.length : ids.length,
        action: "escalate",
        duplicate_booking_ids: ids,
        explanation:
          largest.length >= 3
            ? `Found ${largest.length} duplicate bookings (IDs: ${largest.map((b) => b.id).join(", ")}). Too complex for automatic handling - escalate to human review.`
            : `Found ${clusters.length} separate pairs of duplicate bookings (IDs: ${ids.join(", ")}). Too complex for automatic handling - escalate to human review.`,
      },
      allIds
    );
  }

  const [first, second] = largest;
  return resolvePair([first, second], allIds);
};
