import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken } from '@nestjs/mongoose';
import { InternalServerErrorException } from '@nestjs/common';
import { SettlementService, withUnsoldToCreator } from './settlement.service';
import { BalanceService } from '../balance/balance.service';
import { HoldingsService } from '../holdings/holdings.service';
import { OfferingBid } from '../../models/offering-bid.schema';
import { ListingBid } from '../../models/listing-bid.schema';
import { LedgerType } from '../../common/enums/ledger-type.enum';
import { OfferingBidStatus } from '../../common/enums/offering-bid-status.enum';
import { ListingBidStatus } from '../../common/enums/listing.enum';
import {
  OfferingBidInput,
  planOfferingAllocation,
  selectWinningBid,
} from '../allocation/allocation-engine';

const BID_A = '65f000000000000000000001';
const BID_B = '65f000000000000000000002';
const BID_C = '65f000000000000000000003';

describe('SettlementService', () => {
  let service: SettlementService;
  let offeringBidModel: any;
  let listingBidModel: any;
  let balanceService: any;
  let holdingsService: any;
  const session: any = { id: 'tx' };

  const pending = (
    id: string,
    bidderId: string,
    quantity: number,
    deposit: number,
    sequence: number,
  ): OfferingBidInput => ({
    id,
    bidderId,
    quantity,
    deposit,
    unitPrice: Math.floor(deposit / quantity),
    sequence,
    status: OfferingBidStatus.PENDING,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SettlementService,
        {
          provide: getModelToken(OfferingBid.name),
          useValue: { bulkWrite: jest.fn() },
        },
        {
          provide: getModelToken(ListingBid.name),
          useValue: { bulkWrite: jest.fn() },
        },
        {
          provide: BalanceService,
          useValue: {
            transferEscrow: jest.fn().mockResolvedValue(undefined),
            refund: jest.fn().mockResolvedValue({}),
          },
        },
        {
          provide: HoldingsService,
          useValue: { replaceCapTable: jest.fn().mockResolvedValue(undefined) },
        },
      ],
    }).compile();

    service = module.get<SettlementService>(SettlementService);
    offeringBidModel = module.get(getModelToken(OfferingBid.name));
    listingBidModel = module.get(getModelToken(ListingBid.name));
    balanceService = module.get(BalanceService);
    holdingsService = module.get(HoldingsService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('settleOffering', () => {
    it('should pay proceeds, refund the remainder and replace the cap table', async () => {
      const plan = planOfferingAllocation(
        [
          pending(BID_A, 'alice', 5, 50, 0),
          pending(BID_B, 'bob', 5, 50, 1),
          pending(BID_C, 'carol', 10, 90, 2),
        ],
        { totalUnits: 8, unitsRemaining: 8, reservePrice: 0 },
      );
      offeringBidModel.bulkWrite.mockResolvedValue({ matchedCount: 3 });

      await service.settleOffering({ assetId: 'asset1', sellerId: 'seller' }, plan, session);

      expect(balanceService.transferEscrow.mock.calls).toEqual([
        ['alice', 'seller', 50, LedgerType.PROCEEDS, BID_A, session],
        ['bob', 'seller', 30, LedgerType.PROCEEDS, BID_B, session],
      ]);
      expect(balanceService.refund.mock.calls.map((call: any[]) => [call[0], call[1]])).toEqual([
        ['bob', 20],
        ['carol', 90],
      ]);
      expect(holdingsService.replaceCapTable).toHaveBeenCalledWith(
        'asset1',
        [
          { holderId: 'alice', units: 5 },
          { holderId: 'bob', units: 3 },
        ],
        session,
      );
    });

    it('should mark every bid settled before moving money', async () => {
      const order: string[] = [];
      offeringBidModel.bulkWrite.mockImplementation(async () => {
        order.push('mark');
        return { matchedCount: 1 };
      });
      balanceService.refund.mockImplementation(async () => {
        order.push('refund');
      });
      const plan = planOfferingAllocation([pending(BID_A, 'alice', 10, 500, 0)], {
        totalUnits: 10,
        unitsRemaining: 10,
        reservePrice: 1000,
      });

      await service.settleOffering({ assetId: 'asset1', sellerId: 'seller' }, plan, session);

      expect(order).toEqual(['mark', 'refund']);
      const [operations] = offeringBidModel.bulkWrite.mock.calls[0];
      expect(operations[0].updateOne.update.$set).toMatchObject({
        status: OfferingBidStatus.REFUNDED,
        allocatedUnits: 0,
        charged: 0,
        refunded: 500,
        dust: 0,
      });
      // failed closure leaves the cap table alone
      expect(holdingsService.replaceCapTable).not.toHaveBeenCalled();
      expect(balanceService.transferEscrow).not.toHaveBeenCalled();
    });

    it('should pay dust to the seller and give unsold units back to the creator', async () => {
      offeringBidModel.bulkWrite.mockResolvedValue({ matchedCount: 1 });
      const plan = planOfferingAllocation([pending(BID_A, 'alice', 3, 10, 0)], {
        totalUnits: 5,
        unitsRemaining: 5,
        reservePrice: 0,
      });

      await service.settleOffering({ assetId: 'asset1', sellerId: 'seller' }, plan, session);

      expect(balanceService.transferEscrow).toHaveBeenCalledWith(
        'alice',
        'seller',
        1,
        LedgerType.DUST,
        BID_A,
        session,
      );
      expect(holdingsService.replaceCapTable).toHaveBeenCalledWith(
        'asset1',
        [
          { holderId: 'alice', units: 3 },
          { holderId: 'seller', units: 2 },
        ],
        session,
      );
    });

    it('should abort when a bid was settled before', async () => {
      offeringBidModel.bulkWrite.mockResolvedValue({ matchedCount: 0 });
      const plan = planOfferingAllocation([pending(BID_A, 'alice', 1, 10, 0)], {
        totalUnits: 1,
        unitsRemaining: 1,
        reservePrice: 0,
      });

      await expect(
        service.settleOffering({ assetId: 'asset1', sellerId: 'seller' }, plan, session),
      ).rejects.toThrow(InternalServerErrorException);
      expect(balanceService.transferEscrow).not.toHaveBeenCalled();
    });

    it('should stop at the first failed escrow move', async () => {
      const plan = planOfferingAllocation(
        [
          pending(BID_A, 'alice', 5, 50, 0),
          pending(BID_B, 'bob', 5, 50, 1),
          pending(BID_C, 'carol', 10, 90, 2),
        ],
        { totalUnits: 8, unitsRemaining: 8, reservePrice: 0 },
      );
      offeringBidModel.bulkWrite.mockResolvedValue({ matchedCount: 3 });
      balanceService.transferEscrow
        .mockResolvedValueOnce(undefined)
        .mockRejectedValueOnce(new Error('write conflict'));

      await expect(
        service.settleOffering({ assetId: 'asset1', sellerId: 'seller' }, plan, session),
      ).rejects.toThrow('write conflict');
      expect(balanceService.transferEscrow.mock.calls).toEqual([
        ['alice', 'seller', 50, LedgerType.PROCEEDS, BID_A, session],
        ['bob', 'seller', 30, LedgerType.PROCEEDS, BID_B, session],
      ]);
      // ни возврата bob, ни ставки carol
      expect(balanceService.refund).not.toHaveBeenCalled();
      expect(holdingsService.replaceCapTable).not.toHaveBeenCalled();
    });

    it('should do nothing for an offering without bids', async () => {
      const plan = planOfferingAllocation([], {
        totalUnits: 5,
        unitsRemaining: 5,
        reservePrice: 0,
      });

      await service.settleOffering({ assetId: 'asset1', sellerId: 'seller' }, plan, session);

      expect(offeringBidModel.bulkWrite).not.toHaveBeenCalled();
      expect(holdingsService.replaceCapTable).not.toHaveBeenCalled();
    });
  });

  describe('settleListing', () => {
    const bids = [
      { id: BID_A, bidderId: 'alice', amount: 100, sequence: 0 },
      { id: BID_B, bidderId: 'bob', amount: 80, sequence: 1 },
    ];

    it('should pay the winning bid to the seller and refund the rest', async () => {
      listingBidModel.bulkWrite.mockResolvedValue({ matchedCount: 2 });
      const winner = selectWinningBid(bids, 50);

      await service.settleListing({ listingId: 'listing1', sellerId: 'seller' }, bids, winner, session);

      expect(balanceService.transferEscrow).toHaveBeenCalledWith(
        'alice',
        'seller',
        100,
        LedgerType.PROCEEDS,
        BID_A,
        session,
      );
      expect(balanceService.refund).toHaveBeenCalledWith(
        'bob',
        80,
        BID_B,
        expect.any(String),
        session,
      );
      const [operations] = listingBidModel.bulkWrite.mock.calls[0];
      expect(operations.map((op: any) => op.updateOne.update.$set.status)).toEqual([
        ListingBidStatus.WON,
        ListingBidStatus.REFUNDED,
      ]);
    });

    it('should refund everyone without a winner', async () => {
      listingBidModel.bulkWrite.mockResolvedValue({ matchedCount: 2 });

      await service.settleListing({ listingId: 'listing1', sellerId: 'seller' }, bids, null, session);

      expect(balanceService.transferEscrow).not.toHaveBeenCalled();
      expect(balanceService.refund).toHaveBeenCalledTimes(2);
    });
  });

  describe('withUnsoldToCreator', () => {
    it('should merge unsold units into an existing creator entry', () => {
      expect(
        withUnsoldToCreator([{ holderId: 'creator', units: 2 }], 'creator', 3),
      ).toEqual([{ holderId: 'creator', units: 5 }]);
    });

    it('should not mutate the plan allocations', () => {
      const allocations = [{ holderId: 'creator', units: 2 }];

      withUnsoldToCreator(allocations, 'creator', 3);

      expect(allocations[0].units).toBe(2);
    });
  });
});
