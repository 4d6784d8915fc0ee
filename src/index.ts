import { loadConfig, validateRunConfig } from './config.js'
import { createCaseLoader } from './engine/case-loader.js'
import { extractHtml, isHtmlComplete } from './engine/extract-html.js'
import {
  findBase64Image,
  redactBase64Images,
  saveBase64Image,
} from './engine/extract-image.js'
import { TestEngine } from './engine/test-engine.js'
import { continueUntilComplete } from './llm/continuation.js'
import {
  CancelledError,
  HttpStatusError,
  InvocationFailedError,
  RequestTimeoutError,
  StreamProtocolError,
  classifyError,
} from './llm/errors.js'
import { createTransport } from './llm/http-client.js'
import { createInvoker } from './llm/invoker.js'
import { addUsage } from './shared/token-usage.js'

import type { AppConfig } from './config.js'
import type { CaseLoader } from './engine/case-loader.js'
import type {
  ProgressRange,
  RunSummary,
  TestEngineOptions,
} from './engine/test-engine.js'
import type { ChatInvoker, InvokeRequest } from './llm/invoker.js'
import type {
  CaseResult,
  CategoryStats,
  InvocationOutcome,
  RunObserver,
  SuiteKind,
  TestCase,
  TokenUsage,
} from './types/index.js'

export {
  TestEngine,
  loadConfig,
  validateRunConfig,
  createCaseLoader,
  createInvoker,
  createTransport,
  continueUntilComplete,
  extractHtml,
  isHtmlComplete,
  findBase64Image,
  saveBase64Image,
  redactBase64Images,
  addUsage,
  classifyError,
  CancelledError,
  HttpStatusError,
  InvocationFailedError,
  RequestTimeoutError,
  StreamProtocolError,
}
export type {
  AppConfig,
  CaseLoader,
  CaseResult,
  CategoryStats,
  ChatInvoker,
  InvocationOutcome,
  InvokeRequest,
  ProgressRange,
  RunObserver,
  RunSummary,
  SuiteKind,
  TestCase,
  TestEngineOptions,
  TokenUsage,
}
