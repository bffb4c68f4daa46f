import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken, getConnectionToken } from '@nestjs/mongoose';
import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import { TokenRegistryService } from './token-registry.service';
import { MARKETPLACE_OPERATOR } from './token-registry.interface';
import { RedisLockService } from '../redis-lock/redis-lock.service';
import { Token } from '../../models/token.schema';
import { OperatorApproval } from '../../models/operator-approval.schema';
import { AccountRole } from '../../common/enums/account-role.enum';

describe('TokenRegistryService', () => {
  let service: TokenRegistryService;
  let tokenModel: any;
  let approvalModel: any;
  let redisLockService: any;

  const mockConnection = {
    startSession: jest.fn(() => ({
      endSession: jest.fn(),
      withTransaction: jest.fn((callback) => callback()),
    })),
  };

  const owner = { id: 'alice', role: AccountRole.USER };

  const inSession = (value: unknown) => ({
    session: jest.fn().mockReturnValue({ exec: jest.fn().mockResolvedValue(value) }),
  });

  const mockToken = (token: unknown) => {
    tokenModel.findOne.mockReturnValue(inSession(token));
  };

  const mockBlanketApproval = (approval: unknown) => {
    approvalModel.findOne.mockReturnValue(inSession(approval));
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TokenRegistryService,
        {
          provide: getModelToken(Token.name),
          useValue: {
            findOne: jest.fn(),
            findOneAndUpdate: jest.fn(),
            create: jest.fn(),
            countDocuments: jest.fn(),
          },
        },
        {
          provide: getModelToken(OperatorApproval.name),
          useValue: { findOne: jest.fn(), updateOne: jest.fn() },
        },
        { provide: getConnectionToken(), useValue: mockConnection },
        {
          provide: RedisLockService,
          useValue: { withLock: jest.fn((_key: string, fn: () => Promise<unknown>) => fn()) },
        },
      ],
    }).compile();

    service = module.get<TokenRegistryService>(TokenRegistryService);
    tokenModel = module.get(getModelToken(Token.name));
    approvalModel = module.get(getModelToken(OperatorApproval.name));
    redisLockService = module.get(RedisLockService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('mint', () => {
    it('should assign the next sequential token id', async () => {
      tokenModel.findOne.mockReturnValue({
        sort: jest.fn().mockReturnValue(inSession({ tokenId: 3 })),
      });
      tokenModel.create.mockImplementation(async ([data]: any[]) => [data]);

      const token = await service.mint('alice', 'Painting #4');

      expect(token).toEqual({ tokenId: 4, ownerId: 'alice', name: 'Painting #4', uri: undefined });
    });

    it('should start at 1 in an empty registry', async () => {
      tokenModel.findOne.mockReturnValue({ sort: jest.fn().mockReturnValue(inSession(null)) });
      tokenModel.create.mockImplementation(async ([data]: any[]) => [data]);

      const token = await service.mint('alice', 'First');

      expect(token.tokenId).toBe(1);
    });
  });

  describe('ownerOf', () => {
    it('should throw NotFoundException for an unknown token', async () => {
      mockToken(null);

      await expect(service.ownerOf(99)).rejects.toThrow(NotFoundException);
    });
  });

  describe('safeTransferFrom', () => {
    it('should let the single-token approved operator move the token', async () => {
      mockToken({ tokenId: 1, ownerId: 'alice', approved: MARKETPLACE_OPERATOR });
      tokenModel.findOneAndUpdate.mockReturnValue({
        exec: jest.fn().mockResolvedValue({ tokenId: 1, ownerId: 'bob' }),
      });

      await service.safeTransferFrom(MARKETPLACE_OPERATOR, 'alice', 'bob', 1);

      expect(tokenModel.findOneAndUpdate).toHaveBeenCalledWith(
        { tokenId: 1, ownerId: 'alice' },
        { $set: { ownerId: 'bob' }, $unset: { approved: 1 } },
        expect.objectContaining({ new: true }),
      );
    });

    it('should accept an operator approved for all', async () => {
      mockToken({ tokenId: 1, ownerId: 'alice' });
      mockBlanketApproval({ approved: true });
      tokenModel.findOneAndUpdate.mockReturnValue({
        exec: jest.fn().mockResolvedValue({ tokenId: 1, ownerId: 'bob' }),
      });

      await expect(
        service.safeTransferFrom(MARKETPLACE_OPERATOR, 'alice', 'bob', 1),
      ).resolves.toBeUndefined();
    });

    it('should forbid an unapproved operator', async () => {
      mockToken({ tokenId: 1, ownerId: 'alice' });
      mockBlanketApproval(null);

      await expect(
        service.safeTransferFrom(MARKETPLACE_OPERATOR, 'alice', 'bob', 1),
      ).rejects.toThrow(ForbiddenException);
      expect(tokenModel.findOneAndUpdate).not.toHaveBeenCalled();
    });

    it('should reject a transfer from someone who is not the owner', async () => {
      mockToken({ tokenId: 1, ownerId: 'carol' });

      await expect(service.safeTransferFrom('alice', 'alice', 'bob', 1)).rejects.toThrow(
        BadRequestException,
      );
    });
  });

  describe('approve', () => {
    it('should set the approved operator when called by the owner', async () => {
      mockToken({ tokenId: 1, ownerId: 'alice' });
      tokenModel.findOneAndUpdate.mockReturnValue({
        exec: jest.fn().mockResolvedValue({ tokenId: 1, ownerId: 'alice', approved: 'marketplace' }),
      });

      const token = await service.approve(owner, 1, MARKETPLACE_OPERATOR);

      expect(token.approved).toBe(MARKETPLACE_OPERATOR);
      expect(tokenModel.findOneAndUpdate).toHaveBeenCalledWith(
        { tokenId: 1, ownerId: 'alice' },
        { $set: { approved: MARKETPLACE_OPERATOR } },
        { new: true, session: expect.anything() },
      );
      expect(redisLockService.withLock).toHaveBeenCalledWith('token:1', expect.any(Function));
    });

    it('should read the token and the blanket approval in the same session', async () => {
      const tokenQuery = inSession({ tokenId: 1, ownerId: 'carol' });
      const approvalQuery = inSession({ approved: true });
      tokenModel.findOne.mockReturnValue(tokenQuery);
      approvalModel.findOne.mockReturnValue(approvalQuery);
      tokenModel.findOneAndUpdate.mockReturnValue({
        exec: jest.fn().mockResolvedValue({ tokenId: 1, ownerId: 'carol', approved: 'bob' }),
      });

      await service.approve(owner, 1, 'bob');

      const session = tokenQuery.session.mock.calls[0][0];
      expect(session).toBeTruthy();
      expect(approvalQuery.session).toHaveBeenCalledWith(session);
      expect(tokenModel.findOneAndUpdate.mock.calls[0][2]).toEqual({ new: true, session });
    });

    it('should report Conflict when the owner changed before the update', async () => {
      mockToken({ tokenId: 1, ownerId: 'alice' });
      tokenModel.findOneAndUpdate.mockReturnValue({ exec: jest.fn().mockResolvedValue(null) });

      await expect(service.approve(owner, 1, MARKETPLACE_OPERATOR)).rejects.toThrow(
        ConflictException,
      );
    });

    it('should wrap storage failures in InternalServerErrorException', async () => {
      mockToken({ tokenId: 1, ownerId: 'alice' });
      tokenModel.findOneAndUpdate.mockReturnValue({
        exec: jest.fn().mockRejectedValue(new Error('connection reset')),
      });

      await expect(service.approve(owner, 1, MARKETPLACE_OPERATOR)).rejects.toThrow(
        'Failed approving operator for token 1: connection reset',
      );
    });

    it('should forbid strangers', async () => {
      mockToken({ tokenId: 1, ownerId: 'carol' });
      mockBlanketApproval(null);

      await expect(service.approve(owner, 1, MARKETPLACE_OPERATOR)).rejects.toThrow(
        ForbiddenException,
      );
    });
  });

  describe('setApprovalForAll', () => {
    it('should upsert the blanket approval', async () => {
      approvalModel.updateOne.mockReturnValue({ exec: jest.fn().mockResolvedValue({}) });

      await service.setApprovalForAll(owner, MARKETPLACE_OPERATOR, true);

      expect(approvalModel.updateOne).toHaveBeenCalledWith(
        { ownerId: 'alice', operator: MARKETPLACE_OPERATOR },
        { $set: { approved: true } },
        { upsert: true, session: expect.anything() },
      );
      expect(redisLockService.withLock).toHaveBeenCalledWith(
        'approvals:alice',
        expect.any(Function),
      );
    });

    it('should refuse self-approval without taking the lock', async () => {
      await expect(service.setApprovalForAll(owner, 'alice', true)).rejects.toThrow(
        BadRequestException,
      );
      expect(redisLockService.withLock).not.toHaveBeenCalled();
      expect(approvalModel.updateOne).not.toHaveBeenCalled();
    });

    it('should wrap storage failures in InternalServerErrorException', async () => {
      approvalModel.updateOne.mockReturnValue({
        exec: jest.fn().mockRejectedValue(new Error('connection reset')),
      });

      await expect(
        service.setApprovalForAll(owner, MARKETPLACE_OPERATOR, false),
      ).rejects.toThrow(InternalServerErrorException);
    });
  });
});
