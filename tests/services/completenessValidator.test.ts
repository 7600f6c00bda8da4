import {
  autofillContent,
  classifyAutofill,
  detectIncomplete,
  stripPlaceholders,
} from '../../src/services/ai/completenessValidator';

describe('detectIncomplete', () => {
  it('finds bracketed and parenthesised placeholders', () => {
    expect(detectIncomplete('Dedico esto. [Escriba aqui su dedicatoria]')).toEqual({
      type: 'placeholder',
      sample: '[Escriba aqui su dedicatoria]',
    });
    expect(detectIncomplete('Autor: (Completar con datos del autor)')).toEqual({
      type: 'placeholder',
      sample: '(Completar con datos del autor)',
    });
  });

  it('finds template variables left unrendered', () => {
    expect(detectIncomplete('Resultados de {{topic}} en 2024')).toEqual({ type: 'template_var', sample: '{{topic}}' });
  });

  it('flags short answers that are only instructions', () => {
    expect(detectIncomplete('Escriba aqui el resumen del capitulo.')).toEqual({
      type: 'instruction',
      sample: 'Escriba aqui el resumen del capitulo.',
    });
  });

  it('accepts real content, including long text that mentions an instruction', () => {
    expect(detectIncomplete('La investigacion analiza el consumo de agua.')).toBeNull();
    expect(detectIncomplete(`${'Texto academico. '.repeat(20)}reemplace este texto`)).toBeNull();
  });
});

describe('stripPlaceholders', () => {
  it('removes placeholder fragments and the blank lines they leave', () => {
    expect(stripPlaceholders('Gracias a todos. [Inserte nombres aqui]\n\n\n\n(Completar) Fin {{x}}.')).toBe(
      'Gracias a todos.\n\nFin .'
    );
  });
});

describe('autofill', () => {
  it('classifies front-matter sections by their last path segment', () => {
    expect(classifyAutofill('Preliminares/Dedicatoria')).toBe('dedicatoria');
    expect(classifyAutofill('Preliminares/AGRADECIMIENTOS')).toBe('agradecimiento');
    expect(classifyAutofill('Preliminares/Lista de abreviaturas')).toBe('abreviaturas');
    expect(classifyAutofill('Capitulo 1')).toBeNull();
  });

  it('returns stock text only for known sections', () => {
    expect(autofillContent('Preliminares/Lista de abreviaturas')).toBe(
      'No se identificaron abreviaturas relevantes en el presente documento.'
    );
    expect(autofillContent('Capitulo 1')).toBeNull();
  });
});
