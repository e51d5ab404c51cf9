import { env } from '../config/env.js';
import { parseScanTargets, type ScanTarget } from '../config/scan_targets.js';
import { logger, errorFields } from '../infra/logger.js';
import { PolyClient } from '../data/polymarket/poly_client.js';
import { MarketDiscovery } from '../data/polymarket/market_discovery.js';
import { calculateNetProfit, evaluateOpportunity } from '../strategy/arb_calculator.js';
import type { CalculatorParams, Opportunity } from '../strategy/types.js';

/**
 * One-shot REST scan. No Redis, no Telegram.
 *
 * Scans the SCAN_MARKETS pairs, or with `--discover` (or when SCAN_MARKETS is
 * empty) the DISCOVER_LIMIT most liquid active binary markets.
 */

const params: CalculatorParams = {
    threshold: env.ARB_THRESHOLD,
    minProfitPercent: env.MIN_PROFIT_PERCENT,
    minLiquidityUsd: env.MIN_LIQUIDITY_USD,
    maxPositionUsd: env.MAX_POSITION_SIZE_USD,
};

async function scanTarget(client: PolyClient, target: ScanTarget): Promise<Opportunity | null> {
    const [yes, no] = await Promise.all([
        client.getBestAsk(target.yesTokenId),
        client.getBestAsk(target.noTokenId),
    ]);

    if (!yes || !no) {
        console.log(`  ⏭️  ${target.instrumentId}: missing ask on ${!yes ? 'YES' : 'NO'}`);
        return null;
    }

    const evaluation = evaluateOpportunity(target.instrumentId, yes, no, params);
    if (!evaluation.ok) {
        console.log(
            `  ·  ${target.instrumentId}: ${evaluation.reason} (sum ${(yes.price + no.price).toFixed(4)})`
        );
        return null;
    }

    return evaluation.opportunity;
}

async function resolveTargets(): Promise<ScanTarget[]> {
    const { targets, invalid } = parseScanTargets(env.SCAN_MARKETS);

    for (const entry of invalid) {
        console.error(`❌ Ignoring malformed SCAN_MARKETS entry: ${entry}`);
    }

    if (targets.length > 0 && !process.argv.includes('--discover')) {
        return targets;
    }

    console.log(`\n🔎 Discovering up to ${env.DISCOVER_LIMIT} active binary market(s) via ${env.GAMMA_URL}`);
    const discovered = await new MarketDiscovery(env.GAMMA_URL).discover(env.DISCOVER_LIMIT, env.DISCOVER_MAX_EVENTS);
    for (const market of discovered) {
        console.log(`  • ${market.instrumentId} | liq $${market.liquidity.toFixed(0)} | ${market.question}`);
    }
    return discovered;
}

async function main() {
    const targets = await resolveTargets();

    if (targets.length === 0) {
        console.error('❌ Nothing to scan. Set SCAN_MARKETS (instrumentId:yesTokenId:noTokenId,...) or check discovery.');
        process.exit(1);
    }

    console.log(`\n🔍 Scanning ${targets.length} market(s) via ${env.POLY_REST_URL}`);
    console.log(`   Threshold: ${params.threshold} | Min Profit: ${params.minProfitPercent}% | Min Liquidity: $${params.minLiquidityUsd} | Fee: ${env.FEE_RATE}\n`);

    const client = new PolyClient(env.POLY_REST_URL);
    const found: Opportunity[] = [];

    for (const target of targets) {
        const opportunity = await scanTarget(client, target);
        if (opportunity) {
            found.push(opportunity);
        }
    }

    found.sort((a, b) => b.profitPercent - a.profitPercent);

    console.log(`\n🎯 Opportunities: ${found.length}`);
    for (const opp of found) {
        const netUsd = calculateNetProfit(opp.priceA, opp.priceB, opp.maxVolumeUsd, env.FEE_RATE);
        console.log(
            `  ${opp.instrumentId} | YES ${opp.priceA.toFixed(4)} + NO ${opp.priceB.toFixed(4)} = ${opp.sumPrice.toFixed(4)}` +
            ` | ${opp.profitPercent.toFixed(2)}% | vol $${opp.maxVolumeUsd.toFixed(2)} | +$${opp.expectedProfitUsd.toFixed(2)}` +
            ` | net $${netUsd.toFixed(2)}`
        );
    }

    logger.info('scan.once.done', { scanned: targets.length, found: found.length });
}

main().catch((error) => {
    logger.error('scan.once.fatal', errorFields(error));
    process.exit(1);
});
