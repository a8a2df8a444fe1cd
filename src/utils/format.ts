/**
 * Chat reply formatting
 */

import { ExecuteIntentResult, Position, TradeIntent } from '../types';

function formatPrice(price: number): string {
  return price.toFixed(2);
}

function formatPercent(ratio: number): string {
  const percent = (ratio * 100).toFixed(2);
  return ratio >= 0 ? `+${percent}%` : `${percent}%`;
}

export function formatIntent(intent: TradeIntent): string {
  const lines = [
    `📊 Signal: ${intent.action} ${intent.symbol}`,
    `Kind: ${intent.orderKind} | Leverage: ${intent.leverage}x`,
    `Entries: ${intent.entries.map(entry => (entry === 'market' ? 'market' : String(entry))).join(', ')}`
  ];

  if (intent.stopLoss !== undefined) {
    lines.push(`Stop loss: ${intent.stopLoss}`);
  }
  if (intent.takeProfits.length > 0) {
    lines.push(`Take profits: ${intent.takeProfits.join(', ')}`);
  }
  if (intent.action === 'CLOSE') {
    lines.push(`Close: ${Math.round(intent.sellFraction * 100)}%`);
  }

  return lines.join('\n');
}

export function formatExecution(result: ExecuteIntentResult): string {
  if (!result.success) {
    return `❌ ${result.action} failed (${result.kind}): ${result.error}`;
  }

  if (result.action === 'OPEN') {
    const { position } = result;
    const legs = result.filledLegs + result.failedLegs;
    return `✅ Opened ${position.symbol}: size ${position.currentSize} @ ${formatPrice(position.averageEntryPrice)} `
      + `(${result.filledLegs}/${legs} legs filled)`;
  }

  const remainder = result.positionClosed ? 'position closed' : `${result.remainingSize} remaining`;
  return `✅ Sold ${result.closedSize} ${result.symbol} @ ${formatPrice(result.exitPrice)} `
    + `(P/L ${formatPercent(result.pnlRatio)}, ${remainder})`;
}

export function formatPosition(position: Position): string {
  const filled = position.takeProfits.filter(tp => tp.filled).length;
  const takeProfits = position.takeProfits.length > 0
    ? ` TP ${filled}/${position.takeProfits.length}`
    : '';
  const stopLoss = position.stopLoss !== undefined ? ` SL ${position.stopLoss}` : '';
  return `• ${position.symbol} ${position.currentSize}/${position.initialSize} @ ${formatPrice(position.averageEntryPrice)} `
    + `(${position.leverage}x)${stopLoss}${takeProfits}`;
}
