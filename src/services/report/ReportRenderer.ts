import { DirectoryEntry, GroupedEntries } from '@/types/directory.types';
import { ATTRIBUTE_TRANSLATIONS } from '@/utils/ldap-utils';
import { AttributeDecoder, htmlEscape } from './AttributeDecoder';
import { sanitizeId } from './IdentityResolver';
import { RendererOptions, StructuredEntry, StructuredGroup } from './types';

// First of these not used by the delimiter stands in for delimiter characters and line breaks
const FIELD_FILLERS = [' ', '_', '-', '.'] as const;

/**
 * Report Renderer
 *
 * Renders entry lists and grouped entries as HTML tables, JSON documents and
 * delimited flat text. Every format goes through the same AttributeDecoder.
 */
export class ReportRenderer {
  private readonly options: RendererOptions;

  constructor(
    private readonly decoder: AttributeDecoder,
    options: Partial<RendererOptions> = {}
  ) {
    this.options = {
      delimiter: '\t',
      ...options
    };
  }

  /**
   * Column heading: the friendly alias when there is one, else the attribute name
   */
  columnHeading(attribute: string): string {
    return Object.hasOwn(ATTRIBUTE_TRANSLATIONS, attribute) ? ATTRIBUTE_TRANSLATIONS[attribute] : attribute;
  }

  /**
   * One header row plus body of a table. Sections are meant to be joined by
   * renderHtmlTable so grouped reports keep their columns aligned.
   */
  renderHtmlSection(entries: readonly DirectoryEntry[], columns: readonly string[], header = ''): string {
    const of: string[] = [];

    if (header !== '') {
      of.push(`<thead><tr><td colspan="${columns.length}" id="cn_${sanitizeId(header)}">${htmlEscape(header)}</td></tr></thead>`);
    }

    of.push('<tbody><tr>');
    for (const hdr of columns) {
      of.push(`<th>${htmlEscape(this.columnHeading(hdr))}</th>`);
    }
    of.push('</tr>\n');

    for (const entry of entries) {
      of.push('<tr>');
      for (const att of columns) {
        const attribute = entry.get(att);
        of.push(attribute ? `<td>${this.decoder.decodeHtml(attribute)}</td>` : '<td>&nbsp;</td>');
      }
      of.push('</tr>\n');
    }

    of.push('</tbody>\n');
    return of.join('');
  }

  /**
   * Wrap sections in a single table
   */
  renderHtmlTable(sections: readonly string[]): string {
    return `<table>${sections.join('')}</table>`;
  }

  /**
   * One section per classification key, all in one table
   */
  renderGroupedHtmlTables(groups: GroupedEntries, columns: readonly string[]): string {
    const sections: string[] = [];
    for (const [key, members] of groups) {
      sections.push(this.renderHtmlSection(members, columns, key));
    }
    return this.renderHtmlTable(sections);
  }

  /**
   * Full HTML page around a rendered body. Without a stylesheet the page is unstyled.
   */
  renderHtmlDocument(body: string, stylesheet?: string): string {
    const style = stylesheet === undefined ? '' : `<style type="text/css">${stylesheet}</style>`;
    return `<!DOCTYPE html>\n<html>\n<head><meta charset="UTF-8">${style}</head><body>${body}</body></html>`;
  }

  /**
   * Every attribute of an entry, decoded for flat output. Values are the same
   * fields the flat-text report writes.
   */
  toStructured(entry: DirectoryEntry): StructuredEntry {
    const attributes: Record<string, string> = {};
    for (const attribute of entry.list()) {
      attributes[attribute.name] = this.flatField(this.decoder.decodeFlat(attribute));
    }
    return { dn: entry.dn, attributes };
  }

  renderJsonList(entries: readonly DirectoryEntry[]): string {
    return JSON.stringify(entries.map(entry => this.toStructured(entry)), null, 2);
  }

  renderJsonGrouped(groups: GroupedEntries): string {
    const out: StructuredGroup[] = [];
    for (const [key, members] of groups) {
      out.push({ [key]: members.map(entry => this.toStructured(entry)) });
    }
    return JSON.stringify(out, null, 2);
  }

  /**
   * Header line of attribute names, then one line per entry. An absent
   * attribute is an empty field. See flatField for values.
   */
  renderGrepList(entries: readonly DirectoryEntry[], columns: readonly string[]): string {
    const { delimiter } = this.options;
    const out = [columns.join(delimiter)];
    for (const entry of entries) {
      const eo = columns.map(attr => {
        const attribute = entry.get(attr);
        return attribute ? this.flatField(this.decoder.decodeFlat(attribute)) : '';
      });
      out.push(eo.join(delimiter));
    }
    return out.join('\n');
  }

  /**
   * Line breaks and every character of the delimiter become a filler the
   * delimiter does not contain, so a line splits into exactly the header's fields.
   */
  flatField(value: string): string {
    const { delimiter } = this.options;
    const filler = FIELD_FILLERS.find(ch => !delimiter.includes(ch)) ?? '';
    let out = value.replace(/\r\n|\r|\n/g, filler);
    for (const ch of new Set(delimiter)) {
      out = out.split(ch).join(filler);
    }
    return out;
  }
}
