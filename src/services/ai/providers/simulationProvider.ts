import { SKIP_SECTION_TOKEN } from '../../../utils/promptTemplates';
import { isTocPath } from '../../outline/tocDetector';
import { GenerateRequest, GenerateResult, TextProvider } from './types';

const SAMPLE_ABBREVIATIONS = [
  'APA: American Psychological Association',
  'ODS: Objetivos de Desarrollo Sostenible',
  'TIC: Tecnologias de la Informacion y la Comunicacion',
];

/**
 * Offline provider used when no API key is configured. Output depends only
 * on the section, so repeated runs produce the same document.
 */
class SimulationProvider implements TextProvider {
  readonly name = 'simulation';

  readonly model = 'simulation-v1';

  constructor(private readonly delayMs = 0) {}

  isConfigured(): boolean {
    return true;
  }

  async generate({ section }: GenerateRequest): Promise<GenerateResult> {
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }

    let text: string;
    if (isTocPath(section.path)) {
      text = SKIP_SECTION_TOKEN;
    } else if (section.kind === 'abbreviations') {
      text = SAMPLE_ABBREVIATIONS.join('\n');
    } else {
      text = [
        `Esta seccion desarrolla ${section.title} dentro del documento, siguiendo la estructura definida por el formato institucional.`,
        `El texto se genero en modo de simulacion para la ruta ${section.path} (${section.sectionId}); configure un proveedor de IA para obtener contenido definitivo.`,
      ].join('\n\n');
    }

    return { text, provider: this.name, model: this.model };
  }
}

export default SimulationProvider;
