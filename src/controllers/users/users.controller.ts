import {
  Controller,
  Post,
  Get,
  Body,
  Query,
  HttpCode,
  HttpStatus,
  UseGuards,
  DefaultValuePipe,
  ParseIntPipe,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiQuery, ApiBearerAuth } from '@nestjs/swagger';
import { BalanceService } from '../../services/balance/balance.service';
import { HoldingsService } from '../../services/holdings/holdings.service';
import { BidBookService } from '../../services/bid-book/bid-book.service';
import { AmountDto } from '../../dto/amount.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { UserDocument } from '../../models/user.schema';

/**
 * UsersController
 *
 * The caller's own balance, ledger, holdings and offering bids
 */
@ApiTags('Users')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('users/me')
export class UsersController {
  constructor(
    private balanceService: BalanceService,
    private holdingsService: HoldingsService,
    private bidBookService: BidBookService,
  ) {}

  @Get('balance')
  @ApiOperation({ summary: 'Free and escrowed balance' })
  async getBalance(@CurrentUser() user: UserDocument) {
    const userId = user._id.toString();
    const { balance, lockedBalance } = await this.balanceService.getBalance(userId);
    const invariantsValid = await this.balanceService.validateBalanceInvariants(userId);
    return { balance, lockedBalance, total: balance + lockedBalance, invariantsValid };
  }

  @Get('ledger')
  @ApiOperation({ summary: 'Ledger entries, newest first' })
  @ApiQuery({ name: 'limit', required: false, example: 100 })
  async getLedger(
    @CurrentUser() user: UserDocument,
    @Query('limit', new DefaultValuePipe(100), ParseIntPipe) limit: number,
  ) {
    return this.balanceService.getLedger(user._id.toString(), Math.min(Math.max(limit, 1), 500));
  }

  @Get('holdings')
  @ApiOperation({ summary: 'Shares held across all assets' })
  async getHoldings(@CurrentUser() user: UserDocument) {
    const holdings = await this.holdingsService.getHoldingsOf(user._id.toString());
    return holdings.map((holding) => ({ assetId: holding.assetId, units: holding.units }));
  }

  @Get('bids')
  @ApiOperation({ summary: 'Offering bids placed by the caller, newest first' })
  async getBids(@CurrentUser() user: UserDocument) {
    const bids = await this.bidBookService.getBidsOfBidder(user._id.toString());
    return bids.map((bid) => ({
      id: bid._id,
      assetId: bid.assetId,
      quantity: bid.quantity,
      deposit: bid.deposit,
      unitPrice: bid.unitPrice,
      sequence: bid.sequence,
      status: bid.status,
      allocatedUnits: bid.allocatedUnits,
      charged: bid.charged,
      refunded: bid.refunded,
      dust: bid.dust,
    }));
  }

  @Post('deposit')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Deposit funds' })
  async deposit(@CurrentUser() user: UserDocument, @Body() dto: AmountDto) {
    const updated = await this.balanceService.deposit(user._id.toString(), dto.amount);
    return { balance: updated.balance, lockedBalance: updated.lockedBalance };
  }

  @Post('withdraw')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Withdraw free balance through the payout gateway' })
  @ApiResponse({ status: 400, description: 'Insufficient balance' })
  async withdraw(@CurrentUser() user: UserDocument, @Body() dto: AmountDto) {
    const updated = await this.balanceService.withdraw(user._id.toString(), dto.amount);
    return { balance: updated.balance, lockedBalance: updated.lockedBalance };
  }
}
