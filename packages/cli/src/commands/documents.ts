/**
 * documents: list what the knowledge base loaded
 */

import { createKnowledgeBase } from '@wetlands/core';
import { reportError, resolveSettings, type SettingsOverrides } from './settings.js';

export async function documents(options: SettingsOverrides = {}): Promise<void> {
  try {
    const settings = resolveSettings(options);
    const built = await createKnowledgeBase(settings);
    if (!built.ok) {
      reportError(built.error);
      return;
    }

    const summaries = built.value.listDocuments();
    console.log(`\nDocuments in ${settings.knowledge.documentsDir}:`);
    console.log('─'.repeat(70));

    if (summaries.length === 0) {
      console.log('  No documents loaded. Add PDF, text or Markdown files and try again.\n');
      return;
    }

    for (const doc of summaries) {
      console.log(`  📄 ${doc.name}`);
      console.log(`     ${doc.pageCount} pages, ${doc.totalChunks} chunks (${doc.contentTypes.join(', ')})`);
    }
    const stats = built.value.stats();
    console.log(`\n  ${stats.documents} documents, ${stats.chunks} chunks\n`);
  } catch (error) {
    reportError(error);
  }
}
