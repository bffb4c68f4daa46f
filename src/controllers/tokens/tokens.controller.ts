import {
  Controller,
  Post,
  Get,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  UseGuards,
  ParseIntPipe,
  ForbiddenException,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiBearerAuth } from '@nestjs/swagger';
import { TokenRegistryService } from '../../services/token-registry/token-registry.service';
import { MintTokenDto } from '../../dto/mint-token.dto';
import { ApproveTokenDto, SetApprovalForAllDto } from '../../dto/approve-token.dto';
import { TransferTokenDto } from '../../dto/transfer-token.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { UserDocument } from '../../models/user.schema';
import { isOperator, toActor } from '../../common/auth/actor';

@ApiTags('Tokens')
@Controller('tokens')
export class TokensController {
  constructor(private tokenRegistry: TokenRegistryService) {}

  @Post()
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Mint a token (operator)' })
  @ApiResponse({ status: 403, description: 'Caller is not an operator' })
  async mint(@CurrentUser() user: UserDocument, @Body() dto: MintTokenDto) {
    if (!isOperator(toActor(user))) {
      throw new ForbiddenException('Only operators can mint tokens');
    }
    return this.tokenRegistry.mint(dto.to, dto.name, dto.uri);
  }

  @Post('approval-for-all')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Approve or revoke an operator for all of your tokens' })
  async setApprovalForAll(@CurrentUser() user: UserDocument, @Body() dto: SetApprovalForAllDto) {
    await this.tokenRegistry.setApprovalForAll(toActor(user), dto.operator, dto.approved);
    return { operator: dto.operator, approved: dto.approved };
  }

  @Get(':tokenId')
  @ApiOperation({ summary: 'Token owner and approval' })
  @ApiParam({ name: 'tokenId', type: Number })
  @ApiResponse({ status: 404, description: 'Token not found' })
  async get(@Param('tokenId', ParseIntPipe) tokenId: number) {
    const token = await this.tokenRegistry.getToken(tokenId);
    return {
      tokenId: token.tokenId,
      ownerId: token.ownerId,
      approved: token.approved ?? null,
      name: token.name,
      uri: token.uri,
    };
  }

  @Post(':tokenId/approve')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Set or clear the approved operator of a token' })
  @ApiParam({ name: 'tokenId', type: Number })
  async approve(
    @CurrentUser() user: UserDocument,
    @Param('tokenId', ParseIntPipe) tokenId: number,
    @Body() dto: ApproveTokenDto,
  ) {
    return this.tokenRegistry.approve(toActor(user), tokenId, dto.operator ?? null);
  }

  @Post(':tokenId/transfer')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Transfer your token' })
  @ApiParam({ name: 'tokenId', type: Number })
  async transfer(
    @CurrentUser() user: UserDocument,
    @Param('tokenId', ParseIntPipe) tokenId: number,
    @Body() dto: TransferTokenDto,
  ) {
    return this.tokenRegistry.transfer(toActor(user), tokenId, dto.to);
  }
}
