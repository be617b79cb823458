// Container properties
// The image_metadata.xml document stored next to the manifest.

import { create } from 'xmlbuilder2';
import type { LoadFileConfig } from '@loadfile/protocol';

/**
 * Render a creation time as `yyyy/MM/dd HH:mm:ss.SSS UTC`
 */
export function formatCreationTime(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replaceAll('-', '/')} ${iso.slice(11, 23)} UTC`;
}

/**
 * Serialize the container properties
 */
export function renderContainerProperties(config: LoadFileConfig, createdAt: Date): string {
  const properties: Array<[string, string]> = [
    ['case-number', config.caseNumber],
    ['creation-datetime', formatCreationTime(createdAt)],
    ['creation-software-name', config.softwareName],
    ['creation-software-version', config.softwareVersion],
    ['evidence-number', config.evidenceNumber],
    ['examiner-name', config.examiner],
  ];

  const doc = create({ version: '1.0', encoding: 'UTF-8' });
  const list = doc.ele('image-metadata').ele('properties');
  for (const [key, value] of properties) {
    list.ele('property', { key, value });
  }
  return doc.end({ prettyPrint: true });
}
