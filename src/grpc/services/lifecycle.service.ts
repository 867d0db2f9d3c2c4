import * as grpc from '@grpc/grpc-js';
import type { LifecycleContext } from '../../context.js';
import { isLifecycleError, type LifecycleErrorCode } from '../../errors/lifecycleError.js';

// Types derived from LifecycleService proto (uint64 fields arrive as strings)
export interface GetTierRequest {
  tier_id: number;
}

export interface TierResponse {
  id: number;
  status: string;
  duration: number;
  start: number;
  pause: number;
  end: number;
}

export interface GetAssetWindowRequest {
  asset_id: string;
}

export interface AssetWindowResponse {
  asset_id: number;
  tier_id: number;
  window_start: number;
  window_end: number;
  status: string;
  unchecked_window_start: number;
  unchecked_window_end: number;
  unchecked_status: string;
  fee_owed: string;
  discounted_fee_owed: string;
}

export interface LifecycleServiceHandlers {
  GetTier: grpc.handleUnaryCall<GetTierRequest, TierResponse>;
  GetAssetWindow: grpc.handleUnaryCall<GetAssetWindowRequest, AssetWindowResponse>;
}

const GRPC_STATUS_BY_CODE: Record<LifecycleErrorCode, grpc.status> = {
  IllegalStateTransition: grpc.status.FAILED_PRECONDITION,
  IllegalTiming: grpc.status.FAILED_PRECONDITION,
  InvalidMagnitude: grpc.status.INVALID_ARGUMENT,
  InsufficientPayment: grpc.status.FAILED_PRECONDITION,
  UnableToUpdate: grpc.status.FAILED_PRECONDITION,
  NotFound: grpc.status.NOT_FOUND,
  Unauthorized: grpc.status.PERMISSION_DENIED,
};

const toServiceError = (err: unknown): Partial<grpc.StatusObject> => {
  if (isLifecycleError(err)) {
    return { code: GRPC_STATUS_BY_CODE[err.code], details: err.message };
  }
  console.error('[LifecycleService] Unexpected error:', err);
  return { code: grpc.status.INTERNAL, details: 'Internal error' };
};

/**
 * Service handlers for the internal LifecycleService gRPC API.
 */
export function createLifecycleServiceHandlers(context: LifecycleContext): LifecycleServiceHandlers {
  return {
    GetTier: (call, callback) => {
      const { tier_id } = call.request;

      if (!tier_id) {
        return callback({
          code: grpc.status.INVALID_ARGUMENT,
          details: 'tier_id is required',
        });
      }

      try {
        const tier = context.lifecycle.getTier(tier_id);
        callback(null, { ...tier });
      } catch (err) {
        callback(toServiceError(err));
      }
    },

    GetAssetWindow: (call, callback) => {
      const assetId = Number(call.request.asset_id);

      if (!Number.isSafeInteger(assetId) || assetId < 1) {
        return callback({
          code: grpc.status.INVALID_ARGUMENT,
          details: 'asset_id is required',
        });
      }

      try {
        const { checked, unchecked, feeOwed, discountedFeeOwed } = context.temporalState.snapshot(assetId);
        callback(null, {
          asset_id: assetId,
          tier_id: checked.tierId,
          window_start: checked.windowStart,
          window_end: checked.windowEnd,
          status: checked.status,
          unchecked_window_start: unchecked.windowStart,
          unchecked_window_end: unchecked.windowEnd,
          unchecked_status: unchecked.status,
          fee_owed: feeOwed.toString(),
          discounted_fee_owed: discountedFeeOwed.toString(),
        });
      } catch (err) {
        callback(toServiceError(err));
      }
    },
  };
}
