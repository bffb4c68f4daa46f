import { ClientSession } from 'mongoose';

export const TOKEN_REGISTRY = Symbol('TOKEN_REGISTRY');

/**
 * Operator identity the marketplace acts as when it moves a listed token;
 * sellers approve it per token or for all their tokens
 */
export const MARKETPLACE_OPERATOR = 'marketplace';

/**
 * ERC721-style registry of non-fungible tokens, as consumed by the market
 */
export interface TokenRegistry {
  ownerOf(tokenId: number, session?: ClientSession): Promise<string>;
  getApproved(tokenId: number, session?: ClientSession): Promise<string | null>;
  isApprovedForAll(ownerId: string, operator: string, session?: ClientSession): Promise<boolean>;
  /**
   * Moves `tokenId` from `fromId` to `toId` on behalf of `operator`, who must be
   * the owner, the token's approved operator or an operator approved for all
   */
  safeTransferFrom(
    operator: string,
    fromId: string,
    toId: string,
    tokenId: number,
    session?: ClientSession,
  ): Promise<void>;
}
