import { setLogSink } from "./packages/device-cache/src/lib/logger";

// Keep test output clean; suites that assert on logs install their own sink.
setLogSink(() => undefined);
