export {
  aggregateVotes,
  isValidScore,
  rankTopics,
  validateTopics,
  validateVoters,
  validateVotes,
  type VoterWeights,
} from './aggregate';
export { formatConsensusReport } from './report';
export { ConsensusSelector, requiredQuorum, resolveVoterWeights, type ConsensusSelectorDeps } from './selector';
export { loadEditorialBoard, parseEditorialBoard } from './board';
