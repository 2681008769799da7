import workflowConfig from './workflow.config';

export {
  DEFAULT_WORKFLOW_CONFIG,
  WORKFLOW_CONFIG_KEY,
  type ExecutionMode,
  type WorkflowConfig,
} from './workflow.config';

export { workflowConfig };

export const configurations = [workflowConfig];
