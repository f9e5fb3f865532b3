/**
 * @jasmine-eth/sdk
 */

export type { Environment, SdkOptions, SdkSettings } from "./config.js";
export { sdkOptionsFromEnv } from "./config.js";
export { JasmineSdk, createSdk } from "./sdk.js";

export * from "@jasmine-eth/core";
export * from "@jasmine-eth/contracts";
