export { type BundleVerification, type VerifyOptions, verifyBundles } from "./verifier";
