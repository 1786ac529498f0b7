/**
 * @fileoverview Barrel file for all tool definitions.
 * @module src/mcp-server/tools/definitions
 */
import type { AnyToolDefinition } from '../utils/toolDefinition.js';
import { fetchPatientByIdTool } from './radflow-fetch-patient-by-id.tool.js';
import { fetchPatientByPhoneTool } from './radflow-fetch-patient-by-phone.tool.js';
import { fetchStudyDetailsTool } from './radflow-fetch-study-details.tool.js';
import { getCaseUpdateDetailsTool } from './radflow-get-case-update-details.tool.js';
import { getLienBillBalanceTool } from './radflow-get-lien-bill-balance.tool.js';
import { getPatientReportTool } from './radflow-get-patient-report.tool.js';
import { getPatientTodoStatusTool } from './radflow-get-patient-todo-status.tool.js';
import { insertCaseUpdateLogTool } from './radflow-insert-case-update-log.tool.js';

/**
 * Every tool the server exposes, in registration order.
 */
export const allToolDefinitions: AnyToolDefinition[] = [
  fetchPatientByIdTool,
  fetchPatientByPhoneTool,
  fetchStudyDetailsTool,
  getCaseUpdateDetailsTool,
  getPatientReportTool,
  insertCaseUpdateLogTool,
  getPatientTodoStatusTool,
  getLienBillBalanceTool,
];
