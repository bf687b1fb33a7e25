/**
 * Runs the daily lesson workflow once.
 *
 * Usage:
 *   run_daily_workflow              produce and distribute today's lesson
 *   run_daily_workflow stats        print rotation statistics
 *   run_daily_workflow generate-topics [min]
 *                                   top up subjects below min topics
 *
 * Exits 0 on success, 1 on failure.
 */
import { loadConfig, validateConfig } from '../src/config';
import { DEFAULT_MIN_TOPICS, DailyLessonWorkflow } from '../src/application/DailyLessonWorkflow';
import { createDependencies } from '../src/presentation/app';

async function printStatistics(workflow: DailyLessonWorkflow): Promise<void> {
    const stats = await workflow.getStatistics();
    console.log('📊 Rotation statistics');
    console.log(`   Subjects: ${stats.totalSubjects}`);
    console.log(`   Topics: ${stats.totalTopics}`);
    console.log(`   Cases: ${stats.totalCases}`);
    console.log(`   Runs: ${stats.totalRuns}`);
    console.log(`   Current subject: ${stats.currentSubject ?? '-'}`);
    console.log(`   Last run: ${stats.lastRunAt ? stats.lastRunAt.toISOString() : '-'}`);
    for (const [subject, count] of Object.entries(stats.topicsBySubject)) {
        console.log(`   - ${subject}: ${count}`);
    }
}

async function main(): Promise<number> {
    const [command = 'run', arg] = process.argv.slice(2);

    const config = loadConfig();
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        return 1;
    }

    const { workflow } = await createDependencies(config);
    if (!workflow) {
        console.error('❌ LLM_API_KEY is required for the daily workflow');
        return 1;
    }

    switch (command) {
        case 'run': {
            const result = await workflow.run();
            console.log(JSON.stringify(result, null, 2));
            return result.success ? 0 : 1;
        }
        case 'stats':
            await printStatistics(workflow);
            return 0;
        case 'generate-topics': {
            const minTopics = arg ? Number(arg) : DEFAULT_MIN_TOPICS;
            if (!Number.isInteger(minTopics) || minTopics <= 0) {
                console.error(`❌ Invalid topic minimum: ${arg}`);
                return 1;
            }
            const added = await workflow.topUpTopics(minTopics);
            console.log('🧠 Topics added:', added);
            return 0;
        }
        default:
            console.error(`❌ Unknown command: ${command}`);
            return 1;
    }
}

main()
    .then((code) => process.exit(code))
    .catch((error) => {
        console.error('💥 Workflow crashed:', error);
        process.exit(1);
    });
