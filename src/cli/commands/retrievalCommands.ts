import { Command } from 'commander';
import { executeHandler } from '../types';

function withProviderOptions(cmd: Command): Command {
  return cmd
    .option('-c, --config <file>', 'JSON config file (default: .adaptive-rag.json when present)')
    .option('--offline', 'No completion service: heuristic classification, HyDE disabled', false)
    .option('--embedding <provider>', 'Embedding provider: ollama|hash')
    .option('--db <dir>', 'LanceDB directory')
    .option('--table <name>', 'LanceDB table holding the chunks');
}

function withScopeOptions(cmd: Command): Command {
  return cmd
    .option('--documents <ids>', 'Comma-separated document ids to search')
    .option('--area <area>', 'Knowledge area / collection partition')
    .option('--chapter <n>', 'Restrict to a chapter')
    .option('--title <n>', 'Restrict to a title')
    .option('--article <n>', 'Restrict to an article')
    .option('--section <n>', 'Restrict to a section')
    .option('--annex <n>', 'Restrict to an annex');
}

function withRetrieveOptions(cmd: Command): Command {
  return cmd
    .option('--topk-initial <k>', 'Results per search round')
    .option('--topk-final <k>', 'Results returned')
    .option('--no-multihop', 'Never decompose into several search rounds')
    .option('--no-hyde', 'Never generate a hypothetical passage (also disables the fallback)')
    .option('--doc-type <name>', 'Prompt register for hypothetical passages: legal|technical|generic|...')
    .option('--with-text', 'Print full chunk text instead of a preview', false);
}

export const analyzeCommand = withScopeOptions(
  withProviderOptions(
    new Command('analyze').description('Classify a question and show its decomposition').argument('<question>', 'Question text')
  )
).action(async (question, options) => {
  await executeHandler('analyze', { question, ...options });
});

export const retrieveCommand = withRetrieveOptions(
  withScopeOptions(
    withProviderOptions(
      new Command('retrieve')
        .description('Route a question through multihop, standard or HyDE retrieval')
        .argument('<question>', 'Question text')
    )
  )
).action(async (question, options) => {
  await executeHandler('retrieve', { question, ...options });
});

export const batchCommand = withRetrieveOptions(
  withScopeOptions(
    withProviderOptions(
      new Command('batch')
        .description('Retrieve for every question in a file and report usage statistics')
        .argument('<file>', 'Text file (one question per line) or JSON array')
        .option('--stats-out <file>', 'Write the usage statistics snapshot to a JSON file')
    )
  )
).action(async (file, options) => {
  await executeHandler('batch', { file, ...options });
});
