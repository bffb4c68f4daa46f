import {
  BadRequestException,
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
  ParseEnumPipe,
  ParseIntPipe,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiQuery, ApiBearerAuth } from '@nestjs/swagger';
import { CreateListingParams, MarketService } from '../../services/market/market.service';
import { CreateListingDto } from '../../dto/create-listing.dto';
import { PlaceListingBidDto } from '../../dto/place-listing-bid.dto';
import { ParseMongoIdPipe } from '../../common/pipes/mongo-id.pipe';
import { ListingKind, ListingStatus } from '../../common/enums/listing.enum';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { UserDocument } from '../../models/user.schema';
import { toActor } from '../../common/auth/actor';

function toListingParams(dto: CreateListingDto): CreateListingParams {
  const endsAt = dto.endsAt ? new Date(dto.endsAt) : undefined;
  if (dto.kind === ListingKind.LEDGER) {
    if (!dto.assetId || dto.tokenId !== undefined) {
      throw new BadRequestException('LEDGER listings take an assetId and no tokenId');
    }
    return { kind: dto.kind, assetId: dto.assetId, reservePrice: dto.reservePrice, endsAt };
  }
  if (dto.tokenId === undefined || dto.assetId !== undefined) {
    throw new BadRequestException('TOKEN listings take a tokenId and no assetId');
  }
  return { kind: dto.kind, tokenId: dto.tokenId, reservePrice: dto.reservePrice, endsAt };
}

/**
 * ListingsController
 *
 * Single-unit resale auctions of ledger shares and registry tokens
 */
@ApiTags('Listings')
@Controller('listings')
export class ListingsController {
  constructor(private marketService: MarketService) {}

  @Post()
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a listing' })
  @ApiResponse({ status: 400, description: 'Nothing to sell or marketplace not approved' })
  async create(@CurrentUser() user: UserDocument, @Body() dto: CreateListingDto) {
    return this.marketService.createListing(toActor(user), toListingParams(dto));
  }

  @Get()
  @ApiOperation({ summary: 'List listings' })
  @ApiQuery({ name: 'status', enum: ListingStatus, required: false })
  @ApiQuery({ name: 'kind', enum: ListingKind, required: false })
  @ApiQuery({ name: 'limit', required: false, example: 50 })
  async list(
    @Query('status', new ParseEnumPipe(ListingStatus, { optional: true })) status?: ListingStatus,
    @Query('kind', new ParseEnumPipe(ListingKind, { optional: true })) kind?: ListingKind,
    @Query('limit', new DefaultValuePipe(50), ParseIntPipe) limit = 50,
  ) {
    return this.marketService.listListings({ status, kind }, Math.min(Math.max(limit, 1), 200));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get listing details' })
  @ApiParam({ name: 'id', description: 'Listing ID' })
  @ApiResponse({ status: 404, description: 'Listing not found' })
  async get(@Param('id', ParseMongoIdPipe) id: string) {
    return this.marketService.getListing(id);
  }

  @Get(':id/bids')
  @ApiOperation({ summary: 'Bids of a listing in placement order' })
  @ApiParam({ name: 'id', description: 'Listing ID' })
  async bids(@Param('id', ParseMongoIdPipe) id: string) {
    return this.marketService.getListingBids(id);
  }

  @Post(':id/bids')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Bid on a listing', description: 'The amount is escrowed until execution' })
  @ApiParam({ name: 'id', description: 'Listing ID' })
  async placeBid(
    @CurrentUser() user: UserDocument,
    @Param('id', ParseMongoIdPipe) id: string,
    @Body() dto: PlaceListingBidDto,
  ) {
    return this.marketService.placeBid(toActor(user), id, dto.amount);
  }

  @Post(':id/execute')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Execute the listing',
    description: 'Seller or operator at any time, anyone after the end time',
  })
  @ApiParam({ name: 'id', description: 'Listing ID' })
  async execute(@CurrentUser() user: UserDocument, @Param('id', ParseMongoIdPipe) id: string) {
    return this.marketService.execute(toActor(user), id);
  }

  @Post(':id/cancel')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel the listing and refund every bid (seller or operator)' })
  @ApiParam({ name: 'id', description: 'Listing ID' })
  async cancel(@CurrentUser() user: UserDocument, @Param('id', ParseMongoIdPipe) id: string) {
    return this.marketService.cancelListing(toActor(user), id);
  }
}
