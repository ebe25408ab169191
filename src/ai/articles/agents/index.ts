export { runBoardVoter, VoteResponseSchema, type BoardVoterDeps, type VoteResponse } from './board-voter';
export { EditorResponseSchema, runEditor, type EditorDeps, type EditorInput } from './editor';
export { describeChartDataProblem, ResearchResponseSchema, runResearcher, type ResearcherDeps } from './researcher';
export { runTopicScout, ScoutResponseSchema, type TopicScoutDeps } from './scout';
export {
  ARTICLE_CATEGORY,
  ARTICLE_LAYOUT,
  buildChartSpec,
  runWriter,
  WriterResponseSchema,
  type WriterDeps,
  type WriterInput,
} from './writer';
