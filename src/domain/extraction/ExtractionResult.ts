import { ValueObject } from '../shared/ValueObject';

/**
 * Names of the extraction strategies, in pipeline order.
 */
export type StrategyName = 'static_selector' | 'captured_response' | 'media_element' | 'embedded_frame';

export interface ExtractionResultProps {
  /** Page the extraction ran against */
  pageUrl: string;
  /** Download URL, or null when every strategy came up empty */
  downloadUrl: string | null;
  /** Strategy that produced the URL (diagnostic only) */
  strategy: StrategyName | null;
}

/**
 * Outcome of running the extraction pipeline on one page.
 */
export class ExtractionResult extends ValueObject<ExtractionResultProps> {
  private constructor(props: ExtractionResultProps) {
    super(props);
  }

  public static found(pageUrl: string, downloadUrl: string, strategy: StrategyName): ExtractionResult {
    return new ExtractionResult({ pageUrl, downloadUrl, strategy });
  }

  public static none(pageUrl: string): ExtractionResult {
    return new ExtractionResult({ pageUrl, downloadUrl: null, strategy: null });
  }

  public get pageUrl(): string {
    return this.props.pageUrl;
  }

  public get downloadUrl(): string | null {
    return this.props.downloadUrl;
  }

  public get strategy(): StrategyName | null {
    return this.props.strategy;
  }

  public isFound(): boolean {
    return this.props.downloadUrl !== null;
  }
}
