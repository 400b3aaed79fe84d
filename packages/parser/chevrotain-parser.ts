/**
 * VISUALISE clause parser using Chevrotain
 *
 * Lexes and parses one clause (from the VISUALISE keyword up to the next
 * clause or end of input) into a CST, then builds a validated
 * `VisualizationSpec` from it.
 */

import {
  createToken,
  Lexer,
  CstParser,
  type CstNode,
  type CstElement,
  type CstChildrenDictionary,
  type IToken,
  type ILexingError,
  type IRecognitionException,
  tokenMatcher,
  EOF,
} from 'chevrotain';
import { ParseError, type SourcePosition } from '../errors.js';
import {
  type AestheticBinding,
  type AestheticValue,
  type ClauseLocation,
  type FacetSpec,
  type GlobalMapping,
  type GlobalMappingItem,
  type GuideSpec,
  type LabelsSpec,
  type LayerSpec,
  type ParameterValue,
  type Parameters,
  type ProjectSpec,
  type ScaleSpec,
  type SourceReference,
  type ThemeName,
  type ThemeSpec,
  type VisualizationSpec,
  COORD_SYSTEMS,
  THEME_NAMES,
  column,
  isAesthetic,
  isGeom,
  isScaleType,
  literal,
  GEOMS,
} from './ast.js';
import {
  FACET_PROPERTIES,
  GUIDE_PROPERTIES,
  GUIDE_TYPES,
  LABEL_KEYS,
  type ParameterRule,
  PROJECT_PROPERTIES,
  SCALE_PROPERTIES,
  THEME_PROPERTIES,
  checkParameter,
  layerSettingRule,
} from './vocabulary.js';

// ---
// TOKEN DEFINITIONS
// ---

// Word boundary helper - matches when NOT followed by identifier chars
const WB = '(?![a-zA-Z0-9_])';

const keyword = (name: string, word: string) =>
  createToken({ name, pattern: new RegExp(`${word}${WB}`, 'i') });

const Visualise = keyword('Visualise', 'VISUALI[SZ]E');
const From = keyword('From', 'FROM');
const Draw = keyword('Draw', 'DRAW');
const Mapping = keyword('Mapping', 'MAPPING');
const As = keyword('As', 'AS');
const Setting = keyword('Setting', 'SETTING');
const Filter = keyword('Filter', 'FILTER');
const Partition = keyword('Partition', 'PARTITION');
const By = keyword('By', 'BY');
const Scale = keyword('Scale', 'SCALE');
const Facet = keyword('Facet', 'FACET');
const Wrap = keyword('Wrap', 'WRAP');
const Label = keyword('Label', 'LABEL');
const Theme = keyword('Theme', 'THEME');
const Guide = keyword('Guide', 'GUIDE');
const Project = keyword('Project', 'PROJECT');
const TrueKeyword = keyword('TrueKeyword', 'TRUE');
const FalseKeyword = keyword('FalseKeyword', 'FALSE');
const NullKeyword = keyword('NullKeyword', 'NULL');

// SQL operators, only meaningful inside FILTER
const And = keyword('And', 'AND');
const Or = keyword('Or', 'OR');
const Not = keyword('Not', 'NOT');
const Is = keyword('Is', 'IS');
const In = keyword('In', 'IN');
const Like = keyword('Like', 'I?LIKE');
const Between = keyword('Between', 'BETWEEN');

// Identifier comes after all keywords
const Identifier = createToken({ name: 'Identifier', pattern: /[a-zA-Z_][a-zA-Z0-9_]*/ });
const BacktickIdentifier = createToken({ name: 'BacktickIdentifier', pattern: /`[^`]+`/ });

// Literals
const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: /'(?:[^']|'')*'|"(?:[^"]|"")*"/,
  line_breaks: true,
});
const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /\d+(?:\.\d+)?(?:[eE][+-]?\d+)?|\.\d+/ });

// Operators and punctuation
const Arrow = createToken({ name: 'Arrow', pattern: /=>/ });
const ComparisonOp = createToken({ name: 'ComparisonOp', pattern: />=|<=|!=|<>|>|<|=/ });
const Concat = createToken({ name: 'Concat', pattern: /\|\|/ });
const Star = createToken({ name: 'Star', pattern: /\*/ });
const LParen = createToken({ name: 'LParen', pattern: /\(/ });
const RParen = createToken({ name: 'RParen', pattern: /\)/ });
const LBracket = createToken({ name: 'LBracket', pattern: /\[/ });
const RBracket = createToken({ name: 'RBracket', pattern: /]/ });
const Plus = createToken({ name: 'Plus', pattern: /\+/ });
const Minus = createToken({ name: 'Minus', pattern: /-/ });
const Slash = createToken({ name: 'Slash', pattern: /\// });
const Percent = createToken({ name: 'Percent', pattern: /%/ });
const Dot = createToken({ name: 'Dot', pattern: /\./ });
const Comma = createToken({ name: 'Comma', pattern: /,/ });
const Semicolon = createToken({ name: 'Semicolon', pattern: /;/ });

// Skipped
const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, group: Lexer.SKIPPED, line_breaks: true });
const LineComment = createToken({ name: 'LineComment', pattern: /--[^\n]*/, group: Lexer.SKIPPED });
const BlockComment = createToken({
  name: 'BlockComment',
  pattern: /\/\*(?:[^*]|\*(?!\/))*\*\//,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

// Token order matters! Comments before operators, keywords before Identifier
const allTokens = [
  WhiteSpace,
  LineComment,
  BlockComment,
  Visualise,
  From,
  Draw,
  Mapping,
  As,
  Setting,
  Filter,
  Partition,
  By,
  Scale,
  Facet,
  Wrap,
  Label,
  Theme,
  Guide,
  Project,
  TrueKeyword,
  FalseKeyword,
  NullKeyword,
  And,
  Or,
  Not,
  Is,
  In,
  Like,
  Between,
  Identifier,
  BacktickIdentifier,
  StringLiteral,
  NumberLiteral,
  Arrow,
  ComparisonOp,
  Concat,
  Star,
  LParen,
  RParen,
  LBracket,
  RBracket,
  Plus,
  Minus,
  Slash,
  Percent,
  Dot,
  Comma,
  Semicolon,
];

const VisualiseLexer = new Lexer(allTokens);

// ---
// PARSER
// ---

class VisualiseParser extends CstParser {
  constructor() {
    super(allTokens);
    this.performSelfAnalysis();
  }

  // Main entry point
  public visualiseStatement = this.RULE('visualiseStatement', () => {
    this.CONSUME(Visualise);
    this.OPTION(() => {
      this.SUBRULE(this.globalMapping);
    });
    this.OPTION2(() => {
      this.SUBRULE(this.fromClause);
    });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.SUBRULE(this.drawClause) },
        { ALT: () => this.SUBRULE(this.scaleClause) },
        { ALT: () => this.SUBRULE(this.facetClause) },
        { ALT: () => this.SUBRULE(this.labelClause) },
        { ALT: () => this.SUBRULE(this.themeClause) },
        { ALT: () => this.SUBRULE(this.guideClause) },
        { ALT: () => this.SUBRULE(this.projectClause) },
      ]);
    });
    this.OPTION3(() => {
      this.CONSUME(Semicolon);
    });
  });

  private globalMapping = this.RULE('globalMapping', () => {
    this.OR([
      { ALT: () => this.CONSUME(Star) },
      {
        ALT: () => {
          this.SUBRULE(this.mappingItem, { LABEL: 'items' });
          this.MANY(() => {
            this.CONSUME(Comma);
            this.SUBRULE2(this.mappingItem, { LABEL: 'items' });
          });
        },
      },
    ]);
  });

  // `value AS aesthetic`, or a bare identifier
  private mappingItem = this.RULE('mappingItem', () => {
    this.SUBRULE(this.mappingValue);
    this.OPTION(() => {
      this.CONSUME(As);
      this.SUBRULE(this.aestheticName);
    });
  });

  private mappingValue = this.RULE('mappingValue', () => {
    this.OR([
      { ALT: () => this.CONSUME(Identifier) },
      { ALT: () => this.CONSUME(BacktickIdentifier) },
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.SUBRULE(this.numberValue) },
      { ALT: () => this.CONSUME(TrueKeyword) },
      { ALT: () => this.CONSUME(FalseKeyword) },
    ]);
  });

  private numberValue = this.RULE('numberValue', () => {
    this.OPTION(() => this.CONSUME(Minus));
    this.CONSUME(NumberLiteral);
  });

  // `label` is both an aesthetic and a clause keyword
  private aestheticName = this.RULE('aestheticName', () => {
    this.OR([{ ALT: () => this.CONSUME(Identifier) }, { ALT: () => this.CONSUME(Label) }]);
  });

  private fromClause = this.RULE('fromClause', () => {
    this.CONSUME(From);
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Identifier, { LABEL: 'parts' });
          this.MANY(() => {
            this.CONSUME(Dot);
            this.CONSUME2(Identifier, { LABEL: 'parts' });
          });
        },
      },
      { ALT: () => this.CONSUME(StringLiteral, { LABEL: 'path' }) },
    ]);
  });

  private columnRef = this.RULE('columnRef', () => {
    this.OR([{ ALT: () => this.CONSUME(Identifier) }, { ALT: () => this.CONSUME(BacktickIdentifier) }]);
  });

  private columnList = this.RULE('columnList', () => {
    this.SUBRULE(this.columnRef, { LABEL: 'columns' });
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.columnRef, { LABEL: 'columns' });
    });
  });

  private drawClause = this.RULE('drawClause', () => {
    this.CONSUME(Draw);
    this.SUBRULE(this.geomName);
    this.OPTION(() => {
      this.CONSUME(As);
      this.OR([
        { ALT: () => this.CONSUME(Identifier, { LABEL: 'layerName' }) },
        { ALT: () => this.CONSUME(StringLiteral, { LABEL: 'layerName' }) },
      ]);
    });
    this.MANY(() => {
      this.OR2([
        { ALT: () => this.SUBRULE(this.layerMapping) },
        { ALT: () => this.SUBRULE(this.settingClause) },
        { ALT: () => this.SUBRULE(this.filterClause) },
        { ALT: () => this.SUBRULE(this.partitionClause) },
      ]);
    });
  });

  private geomName = this.RULE('geomName', () => {
    this.OR([{ ALT: () => this.CONSUME(Identifier) }, { ALT: () => this.CONSUME(Label) }]);
  });

  private layerMapping = this.RULE('layerMapping', () => {
    this.CONSUME(Mapping);
    this.SUBRULE(this.layerMappingItem, { LABEL: 'items' });
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.layerMappingItem, { LABEL: 'items' });
    });
  });

  // Layers only take the explicit form
  private layerMappingItem = this.RULE('layerMappingItem', () => {
    this.SUBRULE(this.mappingValue);
    this.CONSUME(As);
    this.SUBRULE(this.aestheticName);
  });

  private settingClause = this.RULE('settingClause', () => {
    this.CONSUME(Setting);
    this.SUBRULE(this.parameter, { LABEL: 'params' });
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.parameter, { LABEL: 'params' });
    });
  });

  private parameter = this.RULE('parameter', () => {
    this.OR([
      { ALT: () => this.CONSUME(Identifier, { LABEL: 'name' }) },
      { ALT: () => this.CONSUME(Label, { LABEL: 'name' }) },
    ]);
    this.CONSUME(Arrow);
    this.SUBRULE(this.parameterValue);
  });

  private parameterValue = this.RULE('parameterValue', () => {
    this.OR([
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.SUBRULE(this.numberValue) },
      { ALT: () => this.CONSUME(TrueKeyword) },
      { ALT: () => this.CONSUME(FalseKeyword) },
      { ALT: () => this.CONSUME(NullKeyword) },
      { ALT: () => this.SUBRULE(this.arrayValue) },
    ]);
  });

  private arrayValue = this.RULE('arrayValue', () => {
    this.CONSUME(LBracket);
    this.OPTION(() => {
      this.SUBRULE(this.parameterValue, { LABEL: 'items' });
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.parameterValue, { LABEL: 'items' });
      });
    });
    this.CONSUME(RBracket);
  });

  // FILTER takes a SQL predicate; its tokens are kept verbatim
  private filterClause = this.RULE('filterClause', () => {
    this.CONSUME(Filter);
    this.AT_LEAST_ONE(() => {
      this.OR([
        { ALT: () => this.CONSUME(Identifier, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(BacktickIdentifier, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(StringLiteral, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(NumberLiteral, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(ComparisonOp, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(And, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Or, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Not, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Is, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(In, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Like, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Between, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(NullKeyword, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(TrueKeyword, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(FalseKeyword, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(LParen, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(RParen, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Comma, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Dot, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Plus, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Minus, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Star, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Slash, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Percent, { LABEL: 'parts' }) },
        { ALT: () => this.CONSUME(Concat, { LABEL: 'parts' }) },
      ]);
    });
  });

  private partitionClause = this.RULE('partitionClause', () => {
    this.CONSUME(Partition);
    this.CONSUME(By);
    this.SUBRULE(this.columnList);
  });

  private scaleClause = this.RULE('scaleClause', () => {
    this.CONSUME(Scale);
    this.SUBRULE(this.aestheticName);
    this.OPTION(() => this.SUBRULE(this.settingClause));
  });

  private facetClause = this.RULE('facetClause', () => {
    this.CONSUME(Facet);
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Wrap);
          this.SUBRULE(this.columnList, { LABEL: 'wrapVars' });
        },
      },
      {
        ALT: () => {
          this.SUBRULE2(this.columnList, { LABEL: 'rowVars' });
          this.CONSUME(By);
          this.SUBRULE3(this.columnList, { LABEL: 'colVars' });
        },
      },
    ]);
    this.OPTION(() => this.SUBRULE(this.settingClause));
  });

  private labelClause = this.RULE('labelClause', () => {
    this.CONSUME(Label);
    this.SUBRULE(this.parameter, { LABEL: 'params' });
    this.MANY(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.parameter, { LABEL: 'params' });
    });
  });

  private themeClause = this.RULE('themeClause', () => {
    this.CONSUME(Theme);
    this.OPTION(() => this.CONSUME(Identifier, { LABEL: 'themeName' }));
    this.OPTION2(() => this.SUBRULE(this.settingClause));
  });

  private guideClause = this.RULE('guideClause', () => {
    this.CONSUME(Guide);
    this.SUBRULE(this.aestheticName);
    this.OPTION(() => this.SUBRULE(this.settingClause));
  });

  private projectClause = this.RULE('projectClause', () => {
    this.CONSUME(Project);
    this.OPTION(() => this.CONSUME(Identifier, { LABEL: 'coordName' }));
    this.OPTION2(() => this.SUBRULE(this.settingClause));
  });
}

// Singleton parser instance
const parserInstance = new VisualiseParser();

// ---
// CST HELPERS
// ---

function isToken(element: CstElement): element is IToken {
  return 'image' in element;
}

function isNode(element: CstElement): element is CstNode {
  return 'children' in element;
}

function tokensOf(ctx: CstChildrenDictionary, key: string): IToken[] {
  return (ctx[key] ?? []).filter(isToken);
}

function nodesOf(ctx: CstChildrenDictionary, key: string): CstNode[] {
  return (ctx[key] ?? []).filter(isNode);
}

function firstToken(ctx: CstChildrenDictionary, ...keys: string[]): IToken | undefined {
  for (const key of keys) {
    const [token] = tokensOf(ctx, key);
    if (token) return token;
  }
  return undefined;
}

function onlyNode(ctx: CstChildrenDictionary, key: string): CstNode {
  const [node] = nodesOf(ctx, key);
  if (!node) throw new Error(`Malformed syntax tree: missing ${key}`);
  return node;
}

function onlyToken(ctx: CstChildrenDictionary, ...keys: string[]): IToken {
  const token = firstToken(ctx, ...keys);
  if (!token) throw new Error(`Malformed syntax tree: missing ${keys.join(' | ')}`);
  return token;
}

function tokenPosition(token: IToken): SourcePosition {
  return { line: token.startLine ?? 1, column: token.startColumn ?? 1, offset: token.startOffset };
}

/** Strip quotes and collapse doubled quote characters. */
export function unquote(image: string): string {
  const quote = image[0];
  return image.slice(1, -1).split(quote + quote).join(quote);
}

// ---
// VISITOR (CST → AST)
// ---

interface Named {
  name: string;
  token: IToken;
}

interface ParsedValue {
  value: AestheticValue;
  token: IToken;
}

interface ParsedParameter {
  name: string;
  token: IToken;
  value: ParameterValue;
}

const BaseVisualiseVisitor = parserInstance.getBaseCstVisitorConstructor();

class VisualiseToAstVisitor extends BaseVisualiseVisitor {
  /** Source text of the clause being built, used to keep FILTER predicates verbatim */
  input = '';

  constructor() {
    super();
    this.validateVisitor();
  }

  visualiseStatement(ctx: CstChildrenDictionary): VisualizationSpec {
    const mappingNode = nodesOf(ctx, 'globalMapping')[0];
    const global: GlobalMapping = mappingNode ? this.visit(mappingNode) : { type: 'empty' };
    const fromNode = nodesOf(ctx, 'fromClause')[0];
    const source: SourceReference | null = fromNode ? this.visit(fromNode) : null;

    const layers: LayerSpec[] = nodesOf(ctx, 'drawClause').map(node => this.visit(node));

    // Later declarations for the same aesthetic replace earlier ones
    const scales = new Map<string, ScaleSpec>();
    for (const node of nodesOf(ctx, 'scaleClause')) {
      const scale: ScaleSpec = this.visit(node);
      scales.delete(scale.aesthetic);
      scales.set(scale.aesthetic, scale);
    }

    const guides = new Map<string, GuideSpec>();
    for (const node of nodesOf(ctx, 'guideClause')) {
      const guide: GuideSpec = this.visit(node);
      guides.delete(guide.aesthetic);
      guides.set(guide.aesthetic, guide);
    }

    const facetNodes = nodesOf(ctx, 'facetClause');
    if (facetNodes.length > 1) {
      const token = onlyToken(facetNodes[1].children, 'Facet');
      throw new ParseError('Only one FACET clause is allowed', tokenPosition(token), token.image, [
        'visualiseStatement',
        'facetClause',
      ]);
    }
    const facet: FacetSpec | null = facetNodes.length > 0 ? this.visit(facetNodes[0]) : null;

    const projectNodes = nodesOf(ctx, 'projectClause');
    if (projectNodes.length > 1) {
      const token = onlyToken(projectNodes[1].children, 'Project');
      throw new ParseError('Only one PROJECT clause is allowed', tokenPosition(token), token.image, [
        'visualiseStatement',
        'projectClause',
      ]);
    }
    const project: ProjectSpec | null = projectNodes.length > 0 ? this.visit(projectNodes[0]) : null;

    const labelNodes = nodesOf(ctx, 'labelClause');
    let labels: LabelsSpec | null = null;
    for (const node of labelNodes) {
      labels = { ...(labels ?? {}), ...this.visit(node) };
    }

    const themeNodes = nodesOf(ctx, 'themeClause');
    const theme: ThemeSpec | null = themeNodes.length > 0 ? this.visit(themeNodes[themeNodes.length - 1]) : null;

    return {
      type: 'visualise',
      source,
      global,
      layers,
      scales: [...scales.values()],
      facet,
      labels,
      theme,
      guides: [...guides.values()],
      project,
    };
  }

  globalMapping(ctx: CstChildrenDictionary): GlobalMapping {
    if (ctx.Star) return { type: 'wildcard' };
    return {
      type: 'mappings',
      items: nodesOf(ctx, 'items').map(node => this.visit(node)),
    };
  }

  mappingItem(ctx: CstChildrenDictionary): GlobalMappingItem {
    const { value, token }: ParsedValue = this.visit(onlyNode(ctx, 'mappingValue'));
    const aestheticNode = nodesOf(ctx, 'aestheticName')[0];

    if (aestheticNode) {
      const aesthetic: Named = this.visit(aestheticNode);
      return { type: 'explicit', value, aesthetic: aesthetic.name };
    }
    if (value.type === 'column') {
      return { type: 'implicit', name: value.name };
    }
    throw new ParseError(
      `Constant ${token.image} needs 'AS <aesthetic>' in the global mapping`,
      tokenPosition(token),
      token.image,
      ['visualiseStatement', 'globalMapping', 'mappingItem']
    );
  }

  mappingValue(ctx: CstChildrenDictionary): ParsedValue {
    const numberNode = nodesOf(ctx, 'numberValue')[0];
    if (numberNode) {
      const parsed: { value: number; token: IToken } = this.visit(numberNode);
      return { value: literal(parsed.value), token: parsed.token };
    }

    const token = onlyToken(ctx, 'Identifier', 'BacktickIdentifier', 'StringLiteral', 'TrueKeyword', 'FalseKeyword');
    if (tokenMatcher(token, Identifier)) return { value: column(token.image), token };
    if (tokenMatcher(token, BacktickIdentifier)) return { value: column(token.image.slice(1, -1)), token };
    if (tokenMatcher(token, StringLiteral)) return { value: literal(unquote(token.image)), token };
    return { value: literal(tokenMatcher(token, TrueKeyword)), token };
  }

  numberValue(ctx: CstChildrenDictionary): { value: number; token: IToken } {
    const number = onlyToken(ctx, 'NumberLiteral');
    const minus = firstToken(ctx, 'Minus');
    const value = Number(number.image);
    return { value: minus ? -value : value, token: minus ?? number };
  }

  aestheticName(ctx: CstChildrenDictionary): Named {
    const token = onlyToken(ctx, 'Identifier', 'Label');
    // The LABEL keyword token keeps the user's case; aesthetic names are lower case
    const name = tokenMatcher(token, Label) ? 'label' : token.image;
    return { name, token };
  }

  fromClause(ctx: CstChildrenDictionary): SourceReference {
    const path = firstToken(ctx, 'path');
    if (path) return { type: 'file', path: unquote(path.image) };
    return { type: 'table', name: tokensOf(ctx, 'parts').map(t => t.image).join('.') };
  }

  columnRef(ctx: CstChildrenDictionary): string {
    const token = onlyToken(ctx, 'Identifier', 'BacktickIdentifier');
    return tokenMatcher(token, BacktickIdentifier) ? token.image.slice(1, -1) : token.image;
  }

  columnList(ctx: CstChildrenDictionary): string[] {
    return nodesOf(ctx, 'columns').map(node => this.visit(node));
  }

  drawClause(ctx: CstChildrenDictionary): LayerSpec {
    const geomToken: Named = this.visit(onlyNode(ctx, 'geomName'));
    const geom = geomToken.name.toLowerCase();
    if (!isGeom(geom)) {
      throw new ParseError(
        `Unknown geom '${geomToken.name}'. Expected one of: ${GEOMS.join(', ')}`,
        tokenPosition(geomToken.token),
        geomToken.token.image,
        ['visualiseStatement', 'drawClause', 'geomName']
      );
    }

    const nameToken = firstToken(ctx, 'layerName');
    const name = nameToken ? (tokenMatcher(nameToken, StringLiteral) ? unquote(nameToken.image) : nameToken.image) : null;

    const mappings: AestheticBinding[] = [];
    for (const node of nodesOf(ctx, 'layerMapping')) {
      const items: { aesthetic: Named; value: AestheticValue }[] = this.visit(node);
      for (const item of items) {
        if (!isAesthetic(item.aesthetic.name)) {
          throw new ParseError(
            `Unknown aesthetic '${item.aesthetic.name}' in MAPPING of ${geom} layer`,
            tokenPosition(item.aesthetic.token),
            item.aesthetic.token.image,
            ['visualiseStatement', 'drawClause', 'layerMapping']
          );
        }
        mappings.push({ aesthetic: item.aesthetic.name, value: item.value });
      }
    }

    const settings: Parameters = {};
    for (const node of nodesOf(ctx, 'settingClause')) {
      const params: ParsedParameter[] = this.visit(node);
      for (const param of params) {
        const rule = layerSettingRule(geom, param.name);
        if (!rule) {
          throw new ParseError(
            `Unknown setting '${param.name}' for ${geom} layer`,
            tokenPosition(param.token),
            param.token.image,
            ['visualiseStatement', 'drawClause', 'settingClause']
          );
        }
        expectParameter(rule, param, ['visualiseStatement', 'drawClause', 'settingClause']);
        settings[param.name] = param.value;
      }
    }

    const filters: string[] = nodesOf(ctx, 'filterClause').map(node => this.visit(node));
    const partitionBy: string[] = nodesOf(ctx, 'partitionClause').flatMap(node => this.visit(node));

    return {
      geom,
      name,
      mappings,
      settings,
      filter: filters.length === 0 ? null : filters.length === 1 ? filters[0] : filters.map(f => `(${f})`).join(' AND '),
      partitionBy,
    };
  }

  geomName(ctx: CstChildrenDictionary): Named {
    const token = onlyToken(ctx, 'Identifier', 'Label');
    return { name: token.image, token };
  }

  layerMapping(ctx: CstChildrenDictionary): { aesthetic: Named; value: AestheticValue }[] {
    return nodesOf(ctx, 'items').map(node => this.visit(node));
  }

  layerMappingItem(ctx: CstChildrenDictionary): { aesthetic: Named; value: AestheticValue } {
    const parsed: ParsedValue = this.visit(onlyNode(ctx, 'mappingValue'));
    return { aesthetic: this.visit(onlyNode(ctx, 'aestheticName')), value: parsed.value };
  }

  settingClause(ctx: CstChildrenDictionary): ParsedParameter[] {
    return nodesOf(ctx, 'params').map(node => this.visit(node));
  }

  parameter(ctx: CstChildrenDictionary): ParsedParameter {
    const token = onlyToken(ctx, 'name');
    const name = tokenMatcher(token, Label) ? 'label' : token.image.toLowerCase();
    return { name, token, value: this.visit(onlyNode(ctx, 'parameterValue')) };
  }

  parameterValue(ctx: CstChildrenDictionary): ParameterValue {
    const numberNode = nodesOf(ctx, 'numberValue')[0];
    if (numberNode) {
      const parsed: { value: number } = this.visit(numberNode);
      return parsed.value;
    }
    const arrayNode = nodesOf(ctx, 'arrayValue')[0];
    if (arrayNode) return this.visit(arrayNode);

    const token = onlyToken(ctx, 'StringLiteral', 'TrueKeyword', 'FalseKeyword', 'NullKeyword');
    if (tokenMatcher(token, StringLiteral)) return unquote(token.image);
    if (tokenMatcher(token, NullKeyword)) return null;
    return tokenMatcher(token, TrueKeyword);
  }

  arrayValue(ctx: CstChildrenDictionary): ParameterValue[] {
    return nodesOf(ctx, 'items').map(node => this.visit(node));
  }

  filterClause(ctx: CstChildrenDictionary): string {
    const parts = tokensOf(ctx, 'parts').sort((a, b) => a.startOffset - b.startOffset);
    const first = parts[0];
    const last = parts[parts.length - 1];
    return this.input.slice(first.startOffset, (last.endOffset ?? last.startOffset) + 1).trim();
  }

  partitionClause(ctx: CstChildrenDictionary): string[] {
    return this.visit(onlyNode(ctx, 'columnList'));
  }

  scaleClause(ctx: CstChildrenDictionary): ScaleSpec {
    const aesthetic = validAesthetic(this, ctx, 'scaleClause');
    const scale: ScaleSpec = { aesthetic, scaleType: null, properties: {} };

    for (const param of settingsOf(this, ctx)) {
      if (param.name === 'type') {
        if (typeof param.value !== 'string' || !isScaleType(param.value)) {
          throw new ParseError(
            `Unknown scale type ${JSON.stringify(param.value)} for '${aesthetic}'`,
            tokenPosition(param.token),
            param.token.image,
            ['visualiseStatement', 'scaleClause', 'settingClause']
          );
        }
        scale.scaleType = param.value;
        continue;
      }
      scale.properties[param.name] = checked(SCALE_PROPERTIES, param, 'SCALE', 'scaleClause');
    }
    return scale;
  }

  facetClause(ctx: CstChildrenDictionary): FacetSpec {
    const wrap = nodesOf(ctx, 'wrapVars')[0];
    const layout: FacetSpec['layout'] = wrap
      ? { type: 'wrap', variables: this.visit(wrap) }
      : { type: 'grid', rows: this.visit(onlyNode(ctx, 'rowVars')), cols: this.visit(onlyNode(ctx, 'colVars')) };

    const properties: Parameters = {};
    for (const param of settingsOf(this, ctx)) {
      properties[param.name] = checked(FACET_PROPERTIES, param, 'FACET', 'facetClause');
    }
    return { layout, properties };
  }

  labelClause(ctx: CstChildrenDictionary): LabelsSpec {
    const labels: LabelsSpec = {};
    for (const node of nodesOf(ctx, 'params')) {
      const param: ParsedParameter = this.visit(node);
      if (!isAesthetic(param.name) && !(LABEL_KEYS as readonly string[]).includes(param.name)) {
        throw new ParseError(`Unknown LABEL key '${param.name}'`, tokenPosition(param.token), param.token.image, [
          'visualiseStatement',
          'labelClause',
        ]);
      }
      if (param.value !== null && typeof param.value !== 'string') {
        throw new ParseError(
          `LABEL ${param.name} expects a string or NULL`,
          tokenPosition(param.token),
          param.token.image,
          ['visualiseStatement', 'labelClause']
        );
      }
      labels[param.name] = param.value;
    }
    return labels;
  }

  themeClause(ctx: CstChildrenDictionary): ThemeSpec {
    const nameToken = firstToken(ctx, 'themeName');
    let name: ThemeName | null = null;
    if (nameToken) {
      const lowered = nameToken.image.toLowerCase();
      const known = THEME_NAMES.find(t => t === lowered);
      if (!known) {
        throw new ParseError(
          `Unknown theme '${nameToken.image}'. Expected one of: ${THEME_NAMES.join(', ')}`,
          tokenPosition(nameToken),
          nameToken.image,
          ['visualiseStatement', 'themeClause']
        );
      }
      name = known;
    }

    const properties: Parameters = {};
    for (const param of settingsOf(this, ctx)) {
      properties[param.name] = checked(THEME_PROPERTIES, param, 'THEME', 'themeClause');
    }
    return { name, properties };
  }

  guideClause(ctx: CstChildrenDictionary): GuideSpec {
    const aesthetic = validAesthetic(this, ctx, 'guideClause');
    const guide: GuideSpec = { aesthetic, guideType: null, properties: {} };

    for (const param of settingsOf(this, ctx)) {
      if (param.name === 'type') {
        const known = GUIDE_TYPES.find(t => t === param.value);
        if (!known) {
          throw new ParseError(
            `Unknown guide type ${JSON.stringify(param.value)}. Expected one of: ${GUIDE_TYPES.join(', ')}`,
            tokenPosition(param.token),
            param.token.image,
            ['visualiseStatement', 'guideClause', 'settingClause']
          );
        }
        guide.guideType = known;
        continue;
      }
      guide.properties[param.name] = checked(GUIDE_PROPERTIES, param, 'GUIDE', 'guideClause');
    }
    return guide;
  }

  projectClause(ctx: CstChildrenDictionary): ProjectSpec {
    const nameToken = firstToken(ctx, 'coordName');
    let coord: ProjectSpec['coord'] = 'cartesian';
    if (nameToken) {
      const lowered = nameToken.image.toLowerCase();
      const known = COORD_SYSTEMS.find(c => c === lowered);
      if (!known) {
        throw new ParseError(
          `Unknown coordinate system '${nameToken.image}'. Expected one of: ${COORD_SYSTEMS.join(', ')}`,
          tokenPosition(nameToken),
          nameToken.image,
          ['visualiseStatement', 'projectClause']
        );
      }
      coord = known;
    }

    const properties: Parameters = {};
    for (const param of settingsOf(this, ctx)) {
      properties[param.name] = checked(PROJECT_PROPERTIES[coord], param, `PROJECT ${coord}`, 'projectClause');
    }
    return { coord, properties };
  }
}

// ---
// VISITOR HELPERS
// ---

function settingsOf(visitor: VisualiseToAstVisitor, ctx: CstChildrenDictionary): ParsedParameter[] {
  const node = nodesOf(ctx, 'settingClause')[0];
  return node ? visitor.visit(node) : [];
}

function validAesthetic(visitor: VisualiseToAstVisitor, ctx: CstChildrenDictionary, rule: string): string {
  const aesthetic: Named = visitor.visit(onlyNode(ctx, 'aestheticName'));
  if (!isAesthetic(aesthetic.name)) {
    throw new ParseError(
      `Unknown aesthetic '${aesthetic.name}'`,
      tokenPosition(aesthetic.token),
      aesthetic.token.image,
      ['visualiseStatement', rule, 'aestheticName']
    );
  }
  return aesthetic.name;
}

function expectParameter(rule: ParameterRule, param: ParsedParameter, context: string[]): void {
  const expected = checkParameter(rule, param.value);
  if (expected) {
    throw new ParseError(
      `Setting '${param.name}' expects ${expected}, got ${JSON.stringify(param.value)}`,
      tokenPosition(param.token),
      param.token.image,
      context
    );
  }
}

function checked(
  rules: Readonly<Record<string, ParameterRule>>,
  param: ParsedParameter,
  clause: string,
  rule: string
): ParameterValue {
  const context = ['visualiseStatement', rule, 'settingClause'];
  if (!Object.hasOwn(rules, param.name)) {
    throw new ParseError(
      `Unknown ${clause} property '${param.name}'. Expected one of: ${Object.keys(rules).join(', ')}`,
      tokenPosition(param.token),
      param.token.image,
      context
    );
  }
  expectParameter(rules[param.name], param, context);
  return param.value;
}

const visitorInstance = new VisualiseToAstVisitor();

// ---
// ERROR CONVERSION
// ---

function positionAt(text: string, offset: number): SourcePosition {
  const before = text.slice(0, offset);
  const lines = before.split('\n');
  return { line: lines.length, column: lines[lines.length - 1].length + 1, offset };
}

function lexingError(error: ILexingError, text: string): ParseError {
  const character = text.charAt(error.offset);
  return new ParseError(
    `Unexpected character '${character}'`,
    { line: error.line ?? 1, column: error.column ?? 1, offset: error.offset },
    character,
    ['visualiseStatement']
  );
}

function recognitionError(error: IRecognitionException, text: string): ParseError {
  const token = error.token;
  const atEnd = tokenMatcher(token, EOF) || Number.isNaN(token.startOffset);
  const position = atEnd ? positionAt(text, text.trimEnd().length) : tokenPosition(token);
  const message = atEnd ? `${error.message} at end of clause` : error.message;
  return new ParseError(message, position, atEnd ? null : token.image, [...error.context.ruleStack]);
}

function relocate(error: ParseError, location?: ClauseLocation): ParseError {
  return location ? error.relocate(location) : error;
}

// ---
// PUBLIC API
// ---

export interface ClauseParseResult {
  spec: VisualizationSpec | null;
  errors: ParseError[];
}

/**
 * Parse one clause. `location` is where the clause starts in the full
 * query; error positions are reported relative to it.
 */
export function parseClause(text: string, location?: ClauseLocation): VisualizationSpec {
  const result = parseClauseWithErrors(text, location);
  if (result.errors.length > 0 || !result.spec) {
    throw result.errors[0] ?? new ParseError('Empty VISUALISE clause', null);
  }
  return result.spec;
}

/**
 * Parse with all lexer and parser errors collected instead of thrown.
 */
export function parseClauseWithErrors(text: string, location?: ClauseLocation): ClauseParseResult {
  const lexResult = VisualiseLexer.tokenize(text);
  const lexErrors = lexResult.errors.map(e => relocate(lexingError(e, text), location));

  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.visualiseStatement();
  const parseErrors = parserInstance.errors.map(e => relocate(recognitionError(e, text), location));

  const errors = [...lexErrors, ...parseErrors];
  if (errors.length > 0) return { spec: null, errors };

  visitorInstance.input = text;
  try {
    return { spec: visitorInstance.visit(cst), errors: [] };
  } catch (error) {
    if (error instanceof ParseError) return { spec: null, errors: [relocate(error, location)] };
    throw error;
  }
}

// Export for testing/debugging
export { VisualiseLexer, VisualiseParser, VisualiseToAstVisitor };
