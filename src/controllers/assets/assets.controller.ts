import {
  Controller,
  Post,
  Get,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  UseGuards,
  DefaultValuePipe,
  ParseBoolPipe,
  ParseEnumPipe,
  ParseIntPipe,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiQuery, ApiBearerAuth } from '@nestjs/swagger';
import { OfferingService } from '../../services/offering/offering.service';
import { BidBookService } from '../../services/bid-book/bid-book.service';
import { HoldingsService } from '../../services/holdings/holdings.service';
import { CreateOfferingDto } from '../../dto/create-offering.dto';
import { SubmitOfferingBidDto } from '../../dto/submit-offering-bid.dto';
import { TransferHoldingDto } from '../../dto/transfer-holding.dto';
import { ParseMongoIdPipe } from '../../common/pipes/mongo-id.pipe';
import { AssetStatus } from '../../common/enums/asset-status.enum';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { UserDocument } from '../../models/user.schema';
import { toActor } from '../../common/auth/actor';

/**
 * AssetsController
 *
 * Share offerings: creation, sealed bids, closure and the resulting cap table
 */
@ApiTags('Assets')
@Controller('assets')
export class AssetsController {
  constructor(
    private offeringService: OfferingService,
    private bidBookService: BidBookService,
    private holdingsService: HoldingsService,
  ) {}

  @Post()
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Create an offering',
    description: 'Registers the asset and issues all units to the creator until the offering closes',
  })
  @ApiResponse({ status: 201, description: 'Offering created' })
  async create(@CurrentUser() user: UserDocument, @Body() dto: CreateOfferingDto) {
    return this.offeringService.createOffering(toActor(user), {
      name: dto.name,
      description: dto.description,
      totalUnits: dto.totalUnits,
      reservePrice: dto.reservePrice,
      biddingEndsAt: dto.biddingEndsAt ? new Date(dto.biddingEndsAt) : undefined,
    });
  }

  @Get()
  @ApiOperation({ summary: 'List offerings' })
  @ApiQuery({ name: 'status', enum: AssetStatus, required: false })
  @ApiQuery({ name: 'limit', required: false, example: 50 })
  async list(
    @Query('status', new ParseEnumPipe(AssetStatus, { optional: true })) status?: AssetStatus,
    @Query('limit', new DefaultValuePipe(50), ParseIntPipe) limit = 50,
  ) {
    return this.offeringService.listAssets(status, Math.min(Math.max(limit, 1), 200));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get offering details' })
  @ApiParam({ name: 'id', description: 'Asset ID' })
  @ApiResponse({ status: 404, description: 'Asset not found' })
  async get(@Param('id', ParseMongoIdPipe) id: string) {
    return this.offeringService.getAsset(id);
  }

  @Get(':id/holders')
  @ApiOperation({ summary: 'Cap table snapshot' })
  @ApiParam({ name: 'id', description: 'Asset ID' })
  async holders(@Param('id', ParseMongoIdPipe) id: string) {
    const holdings = await this.offeringService.getHolders(id);
    return holdings.map((holding) => ({ holderId: holding.holderId, units: holding.units }));
  }

  @Get(':id/bids')
  @ApiOperation({
    summary: 'Bids of an offering',
    description: 'In placement order, or with ranked=true by unit price descending',
  })
  @ApiParam({ name: 'id', description: 'Asset ID' })
  @ApiQuery({ name: 'ranked', required: false, type: Boolean })
  async bids(
    @Param('id', ParseMongoIdPipe) id: string,
    @Query('ranked', new ParseBoolPipe({ optional: true })) ranked?: boolean,
  ) {
    await this.offeringService.getAsset(id);
    return ranked
      ? this.bidBookService.getRankedBids(id)
      : this.bidBookService.getBidsForAsset(id);
  }

  @Post(':id/bids')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Submit a sealed bid', description: 'The deposit is escrowed until closure' })
  @ApiParam({ name: 'id', description: 'Asset ID' })
  @ApiResponse({ status: 409, description: 'Offering closed, deadline passed or bid limit reached' })
  async submitBid(
    @CurrentUser() user: UserDocument,
    @Param('id', ParseMongoIdPipe) id: string,
    @Body() dto: SubmitOfferingBidDto,
  ) {
    return this.bidBookService.submitBid(toActor(user), id, dto.quantity, dto.deposit);
  }

  @Post(':id/close')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Close early (creator or operator)' })
  @ApiParam({ name: 'id', description: 'Asset ID' })
  async closeEarly(@CurrentUser() user: UserDocument, @Param('id', ParseMongoIdPipe) id: string) {
    return this.offeringService.closeEarly(toActor(user), id);
  }

  @Post(':id/settle')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Close after the bidding deadline (anyone)' })
  @ApiParam({ name: 'id', description: 'Asset ID' })
  async settle(@CurrentUser() user: UserDocument, @Param('id', ParseMongoIdPipe) id: string) {
    return this.offeringService.closeAtDeadline(toActor(user), id);
  }

  @Post(':id/cancel')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel the offering and refund every bid (creator or operator)' })
  @ApiParam({ name: 'id', description: 'Asset ID' })
  async cancel(@CurrentUser() user: UserDocument, @Param('id', ParseMongoIdPipe) id: string) {
    return this.offeringService.cancelOffering(toActor(user), id);
  }

  @Post(':id/holdings/transfer')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Transfer unlisted shares to another user' })
  @ApiParam({ name: 'id', description: 'Asset ID' })
  async transferHolding(
    @CurrentUser() user: UserDocument,
    @Param('id', ParseMongoIdPipe) id: string,
    @Body() dto: TransferHoldingDto,
  ) {
    return this.holdingsService.transferIssued(toActor(user), id, dto.to, dto.count);
  }
}
