import {
  Inject,
  Injectable,
  NotFoundException,
  BadRequestException,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { Connection, ClientSession, Model, Types } from 'mongoose';
import { User, UserDocument } from '../../models/user.schema';
import {
  LedgerEntry,
  LedgerEntryDocument,
} from '../../models/ledger-entry.schema';
import { LedgerType } from '../../common/enums/ledger-type.enum';
import { assertAmount } from '../../common/utils/money';
import { rethrowAsHttp, runInTransaction } from '../../common/utils/transaction';
import { PAYOUT_GATEWAY, PayoutGateway } from './payout-gateway';

/** Direction of a move per bucket: -1 debit, 0 untouched, 1 credit */
type Direction = -1 | 0 | 1;

interface BalanceMove {
  balance: Direction;
  locked: Direction;
  type: LedgerType;
  referenceId: string;
  description: string;
}

export type SellerCreditType = LedgerType.PROCEEDS | LedgerType.DUST;

// операции с балансом, все атомарно через транзакции
// каждая операция создает запись в ledger
// это единственное место где меняется баланс юзера
@Injectable()
export class BalanceService {
  private readonly logger = new Logger(BalanceService.name);

  constructor(
    @InjectConnection() private connection: Connection,
    @InjectModel(User.name) private userModel: Model<UserDocument>,
    @InjectModel(LedgerEntry.name)
    private ledgerEntryModel: Model<LedgerEntryDocument>,
    @Inject(PAYOUT_GATEWAY) private payoutGateway: PayoutGateway,
  ) {}

  async getBalance(userId: string): Promise<{ balance: number; lockedBalance: number }> {
    const user = await this.userModel.findById(userId).exec();
    if (!user) {
      throw new NotFoundException(`User with ID ${userId} not found`);
    }
    return { balance: user.balance, lockedBalance: user.lockedBalance };
  }

  async getLedger(userId: string, limit = 100): Promise<LedgerEntryDocument[]> {
    return this.ledgerEntryModel
      .find({ userId })
      .sort({ createdAt: -1 })
      .limit(limit)
      .exec();
  }

  // пополнение баланса
  async deposit(
    userId: string,
    amount: number,
    description?: string,
    session?: ClientSession,
  ): Promise<UserDocument> {
    return this.move(
      userId,
      amount,
      {
        balance: 1,
        locked: 0,
        type: LedgerType.DEPOSIT,
        referenceId: `deposit_${new Types.ObjectId().toString()}`,
        description: description || `Deposit ${amount}`,
      },
      session,
    );
  }

  // блокировка средств под ставку: balance -> lockedBalance
  async lockFunds(
    userId: string,
    amount: number,
    referenceId: string,
    description?: string,
    session?: ClientSession,
  ): Promise<UserDocument> {
    return this.move(
      userId,
      amount,
      {
        balance: -1,
        locked: 1,
        type: LedgerType.LOCK,
        referenceId,
        description: description || `Lock funds for bid ${referenceId}`,
      },
      session,
    );
  }

  // возврат из эскроу: lockedBalance -> balance
  async refund(
    userId: string,
    amount: number,
    referenceId: string,
    description?: string,
    session?: ClientSession,
  ): Promise<UserDocument> {
    return this.move(
      userId,
      amount,
      {
        balance: 1,
        locked: -1,
        type: LedgerType.REFUND,
        referenceId,
        description: description || `Refund for bid ${referenceId}`,
      },
      session,
    );
  }

  // списание из эскроу, средства уходят продавцу
  async payout(
    userId: string,
    amount: number,
    referenceId: string,
    description?: string,
    session?: ClientSession,
  ): Promise<UserDocument> {
    return this.move(
      userId,
      amount,
      {
        balance: 0,
        locked: -1,
        type: LedgerType.PAYOUT,
        referenceId,
        description: description || `Payout from escrow for bid ${referenceId}`,
      },
      session,
    );
  }

  // зачисление продавцу (выручка или остаток от деления)
  async credit(
    userId: string,
    amount: number,
    type: SellerCreditType,
    referenceId: string,
    description?: string,
    session?: ClientSession,
  ): Promise<UserDocument> {
    return this.move(
      userId,
      amount,
      {
        balance: 1,
        locked: 0,
        type,
        referenceId,
        description: description || `${type} for bid ${referenceId}`,
      },
      session,
    );
  }

  /**
   * Releases escrow of `fromUserId` to the free balance of `toUserId`:
   * a PAYOUT entry for the bidder paired with a PROCEEDS or DUST entry for the seller
   */
  async transferEscrow(
    fromUserId: string,
    toUserId: string,
    amount: number,
    type: SellerCreditType,
    referenceId: string,
    session?: ClientSession,
  ): Promise<void> {
    assertAmount(amount, 'Amount');

    await runInTransaction(this.connection, session, async (tx) => {
      await this.payout(fromUserId, amount, referenceId, undefined, tx);
      await this.credit(toUserId, amount, type, referenceId, undefined, tx);
    });
  }

  /**
   * Pull payment: debits the free balance first, then hands the amount to the
   * payout gateway inside the same transaction
   */
  async withdraw(
    userId: string,
    amount: number,
    session?: ClientSession,
  ): Promise<UserDocument> {
    assertAmount(amount, 'Amount');
    const referenceId = `withdrawal_${new Types.ObjectId().toString()}`;

    try {
      return await runInTransaction(this.connection, session, async (tx) => {
        const updatedUser = await this.move(
          userId,
          amount,
          {
            balance: -1,
            locked: 0,
            type: LedgerType.WITHDRAWAL,
            referenceId,
            description: `Withdrawal ${amount}`,
          },
          tx,
        );

        await this.payoutGateway.send({ userId, amount, referenceId });
        return updatedUser;
      });
    } catch (error) {
      rethrowAsHttp(this.logger, error, `processing withdrawal for user ${userId}`);
    }
  }

  // проверка инвариантов баланса
  async validateBalanceInvariants(userId: string): Promise<boolean> {
    const user = await this.userModel.findById(userId).exec();
    if (!user) {
      return false;
    }

    const invariantsValid =
      Number.isSafeInteger(user.balance) &&
      Number.isSafeInteger(user.lockedBalance) &&
      user.balance >= 0 &&
      user.lockedBalance >= 0;

    if (!invariantsValid) {
      this.logger.error(
        `Balance invariants violated for user ${userId}: balance=${user.balance}, lockedBalance=${user.lockedBalance}`,
      );
    }

    return invariantsValid;
  }

  private async move(
    userId: string,
    amount: number,
    move: BalanceMove,
    session?: ClientSession,
  ): Promise<UserDocument> {
    assertAmount(amount, 'Amount');

    try {
      return await runInTransaction(this.connection, session, async (tx) => {
        const user = await this.userModel.findById(userId).session(tx).exec();

        if (!user) {
          throw new NotFoundException(`User with ID ${userId} not found`);
        }

        if (move.balance < 0 && user.balance < amount) {
          throw new BadRequestException(
            `Insufficient balance: requested ${amount}, available ${user.balance}`,
          );
        }

        if (move.locked < 0 && user.lockedBalance < amount) {
          throw new BadRequestException(
            `Insufficient locked balance: requested ${amount}, locked ${user.lockedBalance}`,
          );
        }

        const inc: Record<string, number> = {};
        if (move.balance !== 0) {
          inc.balance = move.balance * amount;
        }
        if (move.locked !== 0) {
          inc.lockedBalance = move.locked * amount;
        }

        const updatedUser = await this.userModel
          .findByIdAndUpdate(userId, { $inc: inc }, { new: true, session: tx })
          .exec();

        if (!updatedUser) {
          throw new InternalServerErrorException('Failed to update user balance');
        }

        if (updatedUser.balance < 0 || updatedUser.lockedBalance < 0) {
          throw new InternalServerErrorException(
            `Balance invariants violated after ${move.type} operation`,
          );
        }

        await this.ledgerEntryModel.create(
          [
            {
              userId,
              type: move.type,
              amount,
              referenceId: move.referenceId,
              description: move.description,
            },
          ],
          { session: tx },
        );

        this.logger.log(
          `${move.type} ${amount} for user ${userId}, reference ${move.referenceId}`,
        );

        return updatedUser;
      });
    } catch (error) {
      rethrowAsHttp(this.logger, error, `processing ${move.type} for user ${userId}`);
    }
  }
}
