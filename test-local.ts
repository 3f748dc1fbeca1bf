import 'dotenv/config';
import path from 'path';
import { formatSummaryAsPlainText } from './lib/cost-reporter/html-formatter';
import { generateCostReport } from './lib/cost-reporter/report';

async function testLocalReport() {
  console.log('🧪 Generating EC2 cost report from sample data...\n');

  const inDir = path.join(__dirname, 'fixtures', 'sample');
  const outDir = path.join(__dirname, 'output');

  try {
    const artifacts = generateCostReport({ inDir, outDir });
    console.log(formatSummaryAsPlainText(artifacts));

    if (artifacts.summary.days === 0) {
      console.warn('⚠️  Sample data produced an empty summary');
    }
  } catch (error) {
    console.error('\n❌ Report generation failed:', error);
    if (error instanceof Error) {
      console.error('Error details:', error.message);
      console.error('Stack trace:', error.stack);
    }
    throw error;
  }
}

testLocalReport()
  .then(() => {
    console.log('\n✅ Local report completed successfully!');
    process.exit(0);
  })
  .catch(() => {
    process.exit(1);
  });
