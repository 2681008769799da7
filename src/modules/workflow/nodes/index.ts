/**
 * Centralized node exports and registry list
 * Every built-in node class must appear in ALL_NODE_CLASSES to be registered
 */
import { INode, NodeMetadata, NodeOptions } from '../interfaces/node.interfaces';
import { AgingCalculatorNode } from './aging-calculator.node';
import { DuplicateDetectorNode } from './duplicate-detector.node';
import { FilterNode } from './filter.node';
import { GroupingNode } from './grouping.node';
import { OutstandingCalculatorNode } from './outstanding-calculator.node';
import { RecordMergeNode } from './record-merge.node';
import { SLACheckerNode } from './sla-checker.node';
import { SortNode } from './sort.node';
import { SummaryNode } from './summary.node';
import { TotalsCalculationNode } from './totals-calculation.node';

export interface NodeClass {
  new (options?: NodeOptions): INode;
  readonly metadata: NodeMetadata;
}

export const ALL_NODE_CLASSES: readonly NodeClass[] = [
  // Calculation
  AgingCalculatorNode,
  OutstandingCalculatorNode,
  SLACheckerNode,
  DuplicateDetectorNode,
  TotalsCalculationNode,
  // Aggregation
  GroupingNode,
  FilterNode,
  SortNode,
  SummaryNode,
  RecordMergeNode,
];

export {
  AgingCalculatorNode,
  DuplicateDetectorNode,
  FilterNode,
  GroupingNode,
  OutstandingCalculatorNode,
  RecordMergeNode,
  SLACheckerNode,
  SortNode,
  SummaryNode,
  TotalsCalculationNode,
};
export { BaseNode } from './base.node';
