import { Body, Controller, Get, HttpCode, HttpStatus, Post, Put, Query } from '@nestjs/common';
import { PortfolioSnapshot } from '../metrics/entities/portfolio-snapshot.entity';
import { PortfolioService } from './portfolio.service';
import { PortfolioQueryService } from './portfolio-query.service';
import { CreateTransactionDto } from './dto/create-transaction.dto';
import { ImportTransactionsDto } from './dto/import-transactions.dto';
import { PortfolioStateDto } from './dto/portfolio-state.dto';
import {
  ImportResultDto,
  MonthlyRecapDto,
  PositionsResponseDto,
  RestoreResultDto,
  TransactionResponseDto,
  toPositionResponse,
  toTransactionResponse,
} from './dto/portfolio-response.dto';

@Controller('portfolio')
export class PortfolioController {
  constructor(
    private readonly portfolioService: PortfolioService,
    private readonly queryService: PortfolioQueryService,
  ) {}

  /**
   * Records one buy or sell and updates the position.
   *
   * POST /portfolio/transactions
   * @returns 201 with the recorded transaction; 400 on invalid input or oversell
   */
  @Post('transactions')
  @HttpCode(HttpStatus.CREATED)
  addTransaction(@Body() dto: CreateTransactionDto): TransactionResponseDto {
    return toTransactionResponse(this.portfolioService.addTransaction(dto));
  }

  /**
   * Batch import. Each record is validated and applied on its own.
   *
   * POST /portfolio/transactions/import
   */
  @Post('transactions/import')
  @HttpCode(HttpStatus.OK)
  importTransactions(@Body() dto: ImportTransactionsDto): ImportResultDto {
    const result = this.portfolioService.importTransactions(dto.records);
    return {
      accepted: result.accepted.map(toTransactionResponse),
      rejected: result.rejected,
    };
  }

  /**
   * Transaction history, optionally filtered by symbol.
   *
   * GET /portfolio/transactions?symbol=btc
   */
  @Get('transactions')
  getTransactions(@Query('symbol') symbol?: string): TransactionResponseDto[] {
    return this.queryService.getTransactions(symbol).map(toTransactionResponse);
  }

  /**
   * Open positions without pricing.
   *
   * GET /portfolio/positions
   */
  @Get('positions')
  getPositions(): PositionsResponseDto {
    const positions = this.queryService.getPositions().map(toPositionResponse);
    return { positions, count: positions.length };
  }

  /**
   * Priced holdings, totals, volatility and risk. Unpriced symbols are
   * listed under `gaps`.
   *
   * GET /portfolio/snapshot
   */
  @Get('snapshot')
  getSnapshot(): Promise<PortfolioSnapshot> {
    return this.queryService.getSnapshot();
  }

  /**
   * Latest month with buys: count, P&L, mean return and risk profile.
   *
   * GET /portfolio/recap
   */
  @Get('recap')
  getRecap(): Promise<MonthlyRecapDto> {
    return this.queryService.getRecap();
  }

  /**
   * Refetches every quote, ignoring fresh cache entries.
   *
   * POST /portfolio/refresh
   */
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  refresh(): Promise<PortfolioSnapshot> {
    return this.queryService.refresh();
  }

  /**
   * GET /portfolio/state
   */
  @Get('state')
  exportState(): PortfolioStateDto {
    return this.portfolioService.exportState();
  }

  /**
   * Replaces ledger and alias overrides with persisted state.
   *
   * PUT /portfolio/state
   */
  @Put('state')
  @HttpCode(HttpStatus.OK)
  restoreState(@Body() state: PortfolioStateDto): RestoreResultDto {
    return this.portfolioService.restoreState(state);
  }

  /**
   * Clears all state.
   *
   * POST /portfolio/reset
   */
  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    this.portfolioService.clearAll();
    return { message: 'Portfolio reset successfully' };
  }
}
