/**
 * AWAIT_APPROVAL: human gate between the first plan and collection
 */

import type { PhaseHandler } from "../types";

export const awaitApproval: PhaseHandler = async (state) => ({
  state,
  next: state.approved ? "collect" : "await_approval",
});
