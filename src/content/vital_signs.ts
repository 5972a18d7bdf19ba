/**
 * Vital-signs monitor panels.
 *
 * A card's monitor is a `div.group.box.monitor` holding one child per
 * reading (`.hr`, `.o2`, `.rr`, `.temp`, `.bp`), each with the value in a
 * span. Any reading may be absent.
 */

import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { collapseText, escapeHtml } from './text';

export const MONITOR_SELECTOR = 'div.group.box.monitor';

export const MISSING_READING = 'N/A';

export interface VitalSigns {
  /** Heart rate, bpm */
  hr: string;
  /** Oxygen saturation, % */
  spo2: string;
  /** Respiratory rate, breaths per minute */
  rr: string;
  /** Temperature, °C */
  temp: string;
  /** Blood pressure, mmHg */
  bp: string;
}

const READING_SELECTORS: Record<keyof VitalSigns, string> = {
  hr: '.hr span',
  spo2: '.o2 span',
  rr: '.rr span',
  temp: '.temp span',
  bp: '.bp span',
};

/**
 * Read the five readings from a monitor element. Each one falls back to
 * N/A on its own.
 */
export function extractVitals(monitor: Cheerio<Element>): VitalSigns {
  const read = (selector: string): string => {
    const text = collapseText(monitor.find(selector).first().text());
    return text || MISSING_READING;
  };

  return {
    hr: read(READING_SELECTORS.hr),
    spo2: read(READING_SELECTORS.spo2),
    rr: read(READING_SELECTORS.rr),
    temp: read(READING_SELECTORS.temp),
    bp: read(READING_SELECTORS.bp),
  };
}

const ROW_STYLE = 'border-bottom: 1px solid #00ff00;';
const LABEL_STYLE = 'padding: 8px; font-weight: bold; color: #00ff00;';
const VALUE_STYLE = 'padding: 8px; color: #ffff00; font-size: 18px; font-weight: bold;';

/**
 * Render readings into the fixed monitor table used on card fronts.
 */
export function renderVitals(vitals: VitalSigns): string {
  const rows: Array<[string, string]> = [
    ['Heart Rate', `${escapeHtml(vitals.hr)} bpm`],
    ['SpO2', `${escapeHtml(vitals.spo2)}%`],
    ['Respiratory Rate', `${escapeHtml(vitals.rr)} BrPM`],
    ['Temperature', `${escapeHtml(vitals.temp)}°C`],
    ['Blood Pressure', escapeHtml(vitals.bp)],
  ];

  const body = rows
    .map(
      ([label, value], index) =>
        `<tr${index < rows.length - 1 ? ` style="${ROW_STYLE}"` : ''}>` +
        `<td style="${LABEL_STYLE}">${label}:</td>` +
        `<td style="${VALUE_STYLE}">${value}</td>` +
        '</tr>'
    )
    .join('');

  return (
    '<div class="vital-signs-monitor">' +
    '<h3 style="color: #00ff00; text-align: center; margin: 0 0 15px 0; font-size: 16px;">VITAL SIGNS MONITOR</h3>' +
    `<table style="width: 100%; border-collapse: collapse; color: #00ff00;">${body}</table>` +
    '</div>'
  );
}
