import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken, getConnectionToken } from '@nestjs/mongoose';
import { BalanceService } from './balance.service';
import { PAYOUT_GATEWAY } from './payout-gateway';
import { User } from '../../models/user.schema';
import { LedgerEntry } from '../../models/ledger-entry.schema';
import { LedgerType } from '../../common/enums/ledger-type.enum';
import {
  BadRequestException,
  InternalServerErrorException,
} from '@nestjs/common';

describe('BalanceService', () => {
  let service: BalanceService;
  let userModel: any;
  let ledgerEntryModel: any;
  let payoutGateway: any;

  const mockUser = {
    _id: 'user123',
    username: 'testuser',
    balance: 1000,
    lockedBalance: 0,
  };

  const mockConnection = {
    startSession: jest.fn(() => ({
      endSession: jest.fn(),
      withTransaction: jest.fn((callback) => callback()),
    })),
  };

  // findById(...).session(...).exec() resolves each user in turn
  const mockFindByIdInSession = (...users: unknown[]) => {
    const exec = jest.fn();
    users.forEach((user) => exec.mockResolvedValueOnce(user));
    userModel.findById.mockReturnValue({
      session: jest.fn().mockReturnValue({ exec }),
    });
  };

  const mockUpdate = (...users: unknown[]) => {
    const exec = jest.fn();
    users.forEach((user) => exec.mockResolvedValueOnce(user));
    userModel.findByIdAndUpdate.mockReturnValue({ exec });
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BalanceService,
        {
          provide: getModelToken(User.name),
          useValue: {
            findById: jest.fn(),
            findByIdAndUpdate: jest.fn(),
          },
        },
        {
          provide: getModelToken(LedgerEntry.name),
          useValue: {
            create: jest.fn().mockResolvedValue([{}]),
            find: jest.fn(),
          },
        },
        {
          provide: getConnectionToken(),
          useValue: mockConnection,
        },
        {
          provide: PAYOUT_GATEWAY,
          useValue: { send: jest.fn().mockResolvedValue(undefined) },
        },
      ],
    }).compile();

    service = module.get<BalanceService>(BalanceService);
    userModel = module.get(getModelToken(User.name));
    ledgerEntryModel = module.get(getModelToken(LedgerEntry.name));
    payoutGateway = module.get(PAYOUT_GATEWAY);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('lockFunds', () => {
    it('should move funds from balance to lockedBalance and record LOCK', async () => {
      mockFindByIdInSession({ ...mockUser });
      mockUpdate({ ...mockUser, balance: 800, lockedBalance: 200 });

      const result = await service.lockFunds('user123', 200, 'bid123');

      expect(userModel.findByIdAndUpdate).toHaveBeenCalledWith(
        'user123',
        { $inc: { balance: -200, lockedBalance: 200 } },
        expect.objectContaining({ new: true }),
      );
      expect(ledgerEntryModel.create).toHaveBeenCalledWith(
        [
          expect.objectContaining({
            userId: 'user123',
            type: LedgerType.LOCK,
            amount: 200,
            referenceId: 'bid123',
          }),
        ],
        expect.any(Object),
      );
      expect(result.balance + result.lockedBalance).toBe(1000);
    });

    it('should throw BadRequestException when insufficient balance', async () => {
      mockFindByIdInSession({ ...mockUser, balance: 100 });

      await expect(service.lockFunds('user123', 200, 'bid123')).rejects.toThrow(
        BadRequestException,
      );
      expect(userModel.findByIdAndUpdate).not.toHaveBeenCalled();
      expect(ledgerEntryModel.create).not.toHaveBeenCalled();
    });

    it('should use the caller session without opening a new one', async () => {
      const session = { id: 'outer' };
      mockFindByIdInSession({ ...mockUser });
      mockUpdate({ ...mockUser, balance: 800, lockedBalance: 200 });

      await service.lockFunds('user123', 200, 'bid123', undefined, session as any);

      expect(mockConnection.startSession).not.toHaveBeenCalled();
      expect(ledgerEntryModel.create).toHaveBeenCalledWith(expect.any(Array), { session });
    });
  });

  describe('refund', () => {
    it('should return escrow to the free balance and record REFUND', async () => {
      mockFindByIdInSession({ ...mockUser, balance: 800, lockedBalance: 200 });
      mockUpdate({ ...mockUser, balance: 1000, lockedBalance: 0 });

      await service.refund('user123', 200, 'bid123');

      expect(userModel.findByIdAndUpdate).toHaveBeenCalledWith(
        'user123',
        { $inc: { balance: 200, lockedBalance: -200 } },
        expect.any(Object),
      );
      expect(ledgerEntryModel.create).toHaveBeenCalledWith(
        [expect.objectContaining({ type: LedgerType.REFUND, amount: 200, referenceId: 'bid123' })],
        expect.any(Object),
      );
    });

    it('should refuse to refund more than is locked', async () => {
      mockFindByIdInSession({ ...mockUser, balance: 800, lockedBalance: 100 });

      await expect(service.refund('user123', 200, 'bid123')).rejects.toThrow(
        BadRequestException,
      );
    });
  });

  describe('transferEscrow', () => {
    it('should pair a PAYOUT for the bidder with a PROCEEDS credit for the seller', async () => {
      mockFindByIdInSession(
        { ...mockUser, _id: 'bidder', balance: 0, lockedBalance: 500 },
        { ...mockUser, _id: 'seller', balance: 0, lockedBalance: 0 },
      );
      mockUpdate(
        { ...mockUser, _id: 'bidder', balance: 0, lockedBalance: 0 },
        { ...mockUser, _id: 'seller', balance: 500, lockedBalance: 0 },
      );

      await service.transferEscrow('bidder', 'seller', 500, LedgerType.PROCEEDS, 'bid1');

      expect(userModel.findByIdAndUpdate).toHaveBeenNthCalledWith(
        1,
        'bidder',
        { $inc: { lockedBalance: -500 } },
        expect.any(Object),
      );
      expect(userModel.findByIdAndUpdate).toHaveBeenNthCalledWith(
        2,
        'seller',
        { $inc: { balance: 500 } },
        expect.any(Object),
      );
      expect(ledgerEntryModel.create.mock.calls.map((call: any[]) => call[0][0].type)).toEqual([
        LedgerType.PAYOUT,
        LedgerType.PROCEEDS,
      ]);
      // one transaction for both legs
      expect(mockConnection.startSession).toHaveBeenCalledTimes(1);
    });
  });

  describe('withdraw', () => {
    it('should debit the balance before calling the payout gateway', async () => {
      const order: string[] = [];
      mockFindByIdInSession({ ...mockUser });
      userModel.findByIdAndUpdate.mockReturnValue({
        exec: jest.fn(async () => {
          order.push('debit');
          return { ...mockUser, balance: 700 };
        }),
      });
      payoutGateway.send.mockImplementation(async () => {
        order.push('send');
      });

      const result = await service.withdraw('user123', 300);

      expect(order).toEqual(['debit', 'send']);
      expect(result.balance).toBe(700);
      expect(payoutGateway.send).toHaveBeenCalledWith(
        expect.objectContaining({ userId: 'user123', amount: 300 }),
      );
      expect(ledgerEntryModel.create).toHaveBeenCalledWith(
        [expect.objectContaining({ type: LedgerType.WITHDRAWAL, amount: 300 })],
        expect.any(Object),
      );
    });

    it('should surface a gateway failure as an internal error', async () => {
      mockFindByIdInSession({ ...mockUser });
      mockUpdate({ ...mockUser, balance: 700 });
      payoutGateway.send.mockRejectedValue(new Error('provider down'));

      await expect(service.withdraw('user123', 300)).rejects.toThrow(
        InternalServerErrorException,
      );
    });

    it('should not call the gateway when the balance is short', async () => {
      mockFindByIdInSession({ ...mockUser, balance: 100 });

      await expect(service.withdraw('user123', 300)).rejects.toThrow(BadRequestException);
      expect(payoutGateway.send).not.toHaveBeenCalled();
    });
  });

  describe('validateBalanceInvariants', () => {
    it('should return true when invariants are valid', async () => {
      userModel.findById.mockReturnValue({
        exec: jest.fn().mockResolvedValue({ ...mockUser, balance: 800, lockedBalance: 200 }),
      });

      await expect(service.validateBalanceInvariants('user123')).resolves.toBe(true);
    });

    it('should return false for a negative locked balance', async () => {
      userModel.findById.mockReturnValue({
        exec: jest.fn().mockResolvedValue({ ...mockUser, lockedBalance: -1 }),
      });

      await expect(service.validateBalanceInvariants('user123')).resolves.toBe(false);
    });
  });
});
