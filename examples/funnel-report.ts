/**
 * Funnel report demo
 *
 * Simulates an experiment where variant B lifts click-through but loses more users at
 * the cart, then prints the CTR test, the three reporting tables and the leakage estimate.
 */

import { PopulationSimulator } from '../src/simulation';
import { analyzeEvents } from '../src/analysis';

const { records, totalUsers } = new PopulationSimulator(20240601).simulate({
  variants: [
    {
      id: 'A',
      users: 5000,
      clickRate: 0.032,
      addToCartRate: 0.75,
      purchaseRate: 0.58,
      orderValue: { logMean: 4.0, logStd: 0.4 },
    },
    {
      id: 'B',
      users: 5000,
      clickRate: 0.04,
      addToCartRate: 0.68,
      purchaseRate: 0.55,
      orderValue: { logMean: 4.0, logStd: 0.4 },
    },
  ],
  duplicateEventRate: 0.1,
});

const report = analyzeEvents(records, totalUsers);
const { controlVariant, treatmentVariant, result } = report.getCtrTest();
const leakage = report.getLeakage();

const pct = (value: number | null): string =>
  value === null ? 'N/A' : `${(value * 100).toFixed(2)}%`;

console.log(`CTR test ${treatmentVariant} vs ${controlVariant}`);
console.log(`  z = ${result.zStatistic.toFixed(3)}, p = ${result.pValue.toFixed(4)}`);
console.log(`  absolute lift ${pct(result.absoluteLift)}, relative lift ${pct(result.relativeLift)}`);
console.log(`  significant at alpha ${result.alpha}: ${result.significant ? 'yes' : 'no'}`);

for (const table of ['ctr', 'funnel', 'revenue'] as const) {
  console.log(`\n${table}\n${report.toCSV(table)}`);
}

console.log(`\nLeakage at ${leakage.designatedStage}`);
console.log(`  average drop-off ${pct(leakage.avgDropoffRate)}`);
console.log(`  recovered users ${leakage.recoveredUsersEstimate.toFixed(1)}`);
console.log(
  `  potential revenue ${leakage.potentialRevenue.toFixed(2)} (${leakage.leakagePct.toFixed(2)}% of current)`
);

for (const warning of report.getMetadata().warnings) {
  console.warn(`warning: ${warning}`);
}
