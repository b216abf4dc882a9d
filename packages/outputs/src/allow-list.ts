/**
 * Per-output-type allow-lists.
 *
 * Which unlock conditions and features each output kind may carry, and
 * which unlock conditions it must carry. Keyed by the closed OutputType
 * union, so adding an output kind without an entry fails to compile.
 */

import { FEATURE_TYPE, OUTPUT_TYPE, UNLOCK_CONDITION_TYPE } from "@tanglekit/types";
import type { FeatureType, OutputType, UnlockConditionType } from "@tanglekit/types";

export interface OutputAllowList {
  readonly unlockConditions: ReadonlySet<UnlockConditionType>;
  readonly requiredUnlockConditions: ReadonlySet<UnlockConditionType>;
  readonly features: ReadonlySet<FeatureType>;
  /** Empty for output kinds without immutable features. */
  readonly immutableFeatures: ReadonlySet<FeatureType>;
}

const UC = UNLOCK_CONDITION_TYPE;
const F = FEATURE_TYPE;

export const ALLOW_LISTS: Readonly<Record<OutputType, OutputAllowList>> = {
  [OUTPUT_TYPE.BASIC]: {
    unlockConditions: new Set([UC.ADDRESS, UC.STORAGE_DEPOSIT_RETURN, UC.TIMELOCK, UC.EXPIRATION]),
    requiredUnlockConditions: new Set([UC.ADDRESS]),
    features: new Set([F.SENDER, F.METADATA, F.TAG]),
    immutableFeatures: new Set<FeatureType>(),
  },
  [OUTPUT_TYPE.ALIAS]: {
    unlockConditions: new Set([UC.STATE_CONTROLLER_ADDRESS, UC.GOVERNOR_ADDRESS]),
    requiredUnlockConditions: new Set([UC.STATE_CONTROLLER_ADDRESS, UC.GOVERNOR_ADDRESS]),
    features: new Set([F.SENDER, F.METADATA]),
    immutableFeatures: new Set([F.ISSUER, F.METADATA]),
  },
  [OUTPUT_TYPE.FOUNDRY]: {
    unlockConditions: new Set([UC.IMMUTABLE_ALIAS_ADDRESS]),
    requiredUnlockConditions: new Set([UC.IMMUTABLE_ALIAS_ADDRESS]),
    features: new Set([F.METADATA]),
    immutableFeatures: new Set([F.METADATA]),
  },
  [OUTPUT_TYPE.NFT]: {
    unlockConditions: new Set([UC.ADDRESS, UC.STORAGE_DEPOSIT_RETURN, UC.TIMELOCK, UC.EXPIRATION]),
    requiredUnlockConditions: new Set([UC.ADDRESS]),
    features: new Set([F.SENDER, F.METADATA, F.TAG]),
    immutableFeatures: new Set([F.ISSUER, F.METADATA]),
  },
};

// Protocol bounds
export const MAX_NATIVE_TOKENS = 64;
export const MAX_METADATA_LENGTH = 8192;
export const MAX_TAG_LENGTH = 64;
export const MAX_STATE_METADATA_LENGTH = 8192;
