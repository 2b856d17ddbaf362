import { bootstrapResearchService } from '../packages/core/src/services/research/bootstrap.js';
import type { ResearchOverview } from '../packages/shared/src/types/session.types.js';

function renderOverview(result: ResearchOverview): void {
  console.log(`\n=== ${result.final ? 'Final' : 'Interim'} Research Overview (${result.phase}) ===`);

  console.log('\nTop hypotheses:');
  result.topHypotheses.forEach((h, i) => {
    console.log(
      `  ${String(i + 1)}. [${h.rating.toFixed(0)}] ${h.title} (${String(h.matchesPlayed)} matches)`,
    );
  });

  const { overview } = result;
  if (!overview) {
    console.log('\nNo meta-review was written for this session.');
    return;
  }

  console.log(`\n${overview.summary}`);
  if (overview.themes.length > 0) {
    console.log(`\nThemes: ${overview.themes.join('; ')}`);
  }
  if (overview.recommendations.length > 0) {
    console.log('\nRecommendations:');
    for (const recommendation of overview.recommendations) {
      console.log(`  - ${recommendation}`);
    }
  }
}

async function main(): Promise<void> {
  const goal = process.argv.slice(2).join(' ').trim();
  if (goal === '') {
    console.error('Usage: npm run run:session -- <research goal>');
    process.exit(1);
  }

  const { service, config, backend } = await bootstrapResearchService();

  console.log('=== Agora Research Session ===\n');
  console.log(`Mock LLM: ${process.env['AGORA_MOCK_LLM'] === 'true' ? 'yes' : 'no'}`);
  console.log(`Memory: ${backend}`);
  console.log(`Workers: ${String(config.workers.concurrency)}, budget: ${String(config.budget.maxInvocations)}`);
  console.log('Press Ctrl+C to stop at the next cycle boundary.\n');

  const { session } = await service.setGoal(goal);
  console.log(`Session ${session.id} started`);

  process.once('SIGINT', () => {
    console.log('\nStopping...');
    service.stop(session.id, 'interrupted from the command line').catch((error: unknown) => {
      console.error('Stop request failed:', error);
    });
  });

  const done = await service.waitForCompletion(session.id);
  console.log(`\nSession status: ${done.status}`);
  if (done.failureReason) {
    console.log(`Failure: ${done.failureReason}`);
  }

  renderOverview(await service.requestOverview(session.id));
  console.log('\n=== Session complete ===');
}

main().catch((error: unknown) => {
  console.error('Session failed:', error);
  process.exit(1);
});
