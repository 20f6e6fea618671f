/**
 * Test Kit
 *
 * In-process stand-ins for deterministic tests. Not part of the package exports;
 * tests import from source.
 */

export { ManualClock } from "./clock";
export { MockLedgerNode } from "./mock_node";
export type { MockLedgerNodeOptions, RecordedCall, RpcHandler } from "./mock_node";
export {
  jobToWire,
  makeJob,
  makeReceipt,
  makeVcr,
  receiptToWire,
  repeatAddress,
  repeatHash,
} from "./fixtures";
