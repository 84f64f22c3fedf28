import readline from 'readline';

import { DB_PATH, JOURNEY_DEFINITION_PATH } from './config.js';
import { closeDatabase, initDatabase, sqliteStore } from './db.js';
import { JourneyEngineError } from './errors.js';
import { JourneyEngine, type TurnResult } from './journey/engine.js';
import { MilestoneModel } from './journey/milestone-model.js';
import { ClaudeExtraction } from './llm/claude-extraction.js';
import { ClaudeGeneration } from './llm/claude-generation.js';
import { logger } from './logger.js';

const HELP = `Commands:
  /state     show journey progress
  /advance   move to the next milestone
  /complete  mark the journey as completed
  /retry     answer the last message again after a failed reply
  /quit      exit`;

function parseUserId(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const id = parseInt(raw, 10);
  if (!Number.isInteger(id) || id <= 0) {
    throw new Error(`JOURNEY_USER_ID must be a positive integer, got "${raw}"`);
  }
  return id;
}

function printTurn(result: TurnResult): void {
  console.log(`\n${result.assistantMessage.content}\n`);
  if (result.sentinel.kind === 'recorded') {
    console.log(`  [recorded ${result.sentinel.checkpoint} = ${result.sentinel.value}]`);
  }
  for (const action of result.actions.filter((a) => a.applied)) {
    console.log(`  [${action.name}]`);
  }
}

async function main(): Promise<void> {
  const model = MilestoneModel.fromFile(JOURNEY_DEFINITION_PATH);
  initDatabase();
  logger.info({ dbPath: DB_PATH, journeyType: model.journeyType }, 'Database initialized');

  const engine = new JourneyEngine({
    store: sqliteStore,
    model,
    extraction: new ClaudeExtraction(),
    generation: new ClaudeGeneration(),
  });

  const { user, journey, recentMessages } = engine.startSession({
    userId: parseUserId(process.env.JOURNEY_USER_ID),
    firstName: process.env.JOURNEY_FIRST_NAME,
    lastName: process.env.JOURNEY_LAST_NAME,
  });
  const journeyId = journey.id;

  console.log(`${model.definition.title} (user ${user.id}, journey ${journeyId})`);
  console.log('Type /help for commands.\n');
  for (const m of recentMessages) {
    console.log(`${m.speaker === 'user' ? '>' : ' '} ${m.content}`);
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt('> ');
  rl.prompt();

  for await (const raw of rl) {
    const line = raw.trim();
    if (line === '/quit') break;
    if (!line) {
      rl.prompt();
      continue;
    }

    try {
      switch (line) {
        case '/help':
          console.log(HELP);
          break;
        case '/state':
          console.log(JSON.stringify(engine.getJourneyState(user.id), null, 2));
          break;
        case '/advance': {
          const updated = await engine.advanceMilestone(journeyId);
          console.log(`Now on milestone ${updated.currentMilestone}`);
          break;
        }
        case '/complete':
          await engine.completeJourney(journeyId);
          console.log('Journey completed');
          break;
        case '/retry':
          printTurn(await engine.retryTurn(user.id, journeyId));
          break;
        default:
          printTurn(await engine.processTurn(user.id, journeyId, line));
      }
    } catch (err) {
      if (!(err instanceof JourneyEngineError)) throw err;
      console.log(`  [${err.code}] ${err.message}`);
    }
    rl.prompt();
  }
}

main()
  .then(() => closeDatabase())
  .catch((err) => {
    logger.error({ err }, 'Journey console failed');
    closeDatabase();
    process.exit(1);
  });
