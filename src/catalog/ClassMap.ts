import { ConfigurationError, MetadataError } from '../errors';
import { Label } from '../types';
import { splitCsvLine, splitLines, splitTsvLine } from './tables';

/**
 * Read-only mapping between label display names and machine codes (AudioSet "mid").
 * Built once per run and handed to whatever needs it.
 */
export class ClassMap {
  private readonly byCode: ReadonlyMap<string, Label>;
  private readonly byName: ReadonlyMap<string, Label>;

  constructor(labels: Label[]) {
    const byCode = new Map<string, Label>();
    const byName = new Map<string, Label>();

    for (const label of labels) {
      if (byCode.has(label.machineCode)) {
        throw new MetadataError(`Duplicate machine code in class map: ${label.machineCode}`);
      }
      const frozen = Object.freeze({ ...label });
      byCode.set(label.machineCode, frozen);
      byName.set(label.displayName, frozen);
    }

    this.byCode = byCode;
    this.byName = byName;
  }

  /** Parses `class_labels_indices.csv` (index,mid,display_name with a header row). */
  static fromIndicesCsv(content: string): ClassMap {
    const labels: Label[] = [];

    for (const line of splitLines(content)) {
      const [index, mid, displayName] = splitCsvLine(line);
      if (index === 'index') {
        continue;
      }
      if (!mid || !displayName) {
        throw new MetadataError(`Malformed class map row: ${line}`);
      }
      labels.push({ machineCode: mid, displayName });
    }

    return new ClassMap(labels);
  }

  /** Parses `mid_to_display_name.tsv` (mid, display name; no header). */
  static fromDisplayNameTsv(content: string): ClassMap {
    const labels: Label[] = [];

    for (const line of splitLines(content)) {
      const [mid, displayName] = splitTsvLine(line);
      if (!mid || !displayName) {
        throw new MetadataError(`Malformed class map row: ${line}`);
      }
      labels.push({ machineCode: mid, displayName });
    }

    return new ClassMap(labels);
  }

  get size(): number {
    return this.byCode.size;
  }

  labels(): Label[] {
    return [...this.byCode.values()];
  }

  hasCode(machineCode: string): boolean {
    return this.byCode.has(machineCode);
  }

  labelForCode(machineCode: string): Label {
    const label = this.byCode.get(machineCode);
    if (!label) {
      throw new ConfigurationError(`Unknown label code: ${machineCode}`);
    }
    return label;
  }

  toDisplayName(machineCode: string): string {
    return this.labelForCode(machineCode).displayName;
  }

  toMachineCode(displayName: string): string {
    const label = this.byName.get(displayName);
    if (!label) {
      throw new ConfigurationError(`Unknown label name: "${displayName}"`);
    }
    return label.machineCode;
  }

  /**
   * Resolves requested display names to machine codes.
   * Returns null for 'all', meaning no filtering.
   */
  resolve(names: string[] | 'all'): Set<string> | null {
    if (names === 'all') {
      return null;
    }
    return new Set(names.map(name => this.toMachineCode(name)));
  }
}
