export {
  KnowledgeBase,
  createKnowledgeBase,
  type KnowledgeBaseOptions,
  type ProjectIngestOptions,
  type RemovedProject,
} from './service.js';
