import { Lexer } from './lexer.js';
import { GoSyntaxError } from './syntax-error.js';
import { TokenType, describeToken, isKeyword, isOperator, type Token } from './token.js';

export type DeclarationKind = 'import' | 'const' | 'var' | 'type' | 'func' | 'method';

/**
 * A top-level declaration of a parsed file
 */
export interface Declaration {
  kind: DeclarationKind;
  names: string[];
  line: number;
}

/**
 * Outline of a parsed source file
 */
export interface SourceFile {
  packageName: string;
  imports: string[];
  declarations: Declaration[];
}

// What an operand turned out to be, which decides whether `{` may start a
// composite literal after it
type OperandKind = 'name' | 'literalType' | 'other';

const BINARY_PRECEDENCE: ReadonlyMap<string, number> = new Map([
  ['||', 1],
  ['&&', 2],
  ['==', 3], ['!=', 3], ['<', 3], ['<=', 3], ['>', 3], ['>=', 3],
  ['+', 4], ['-', 4], ['|', 4], ['^', 4],
  ['*', 5], ['/', 5], ['%', 5], ['<<', 5], ['>>', 5], ['&', 5], ['&^', 5],
]);

const UNARY_OPERATORS: ReadonlySet<string> = new Set(['+', '-', '!', '^', '&', '~', '*']);

const ASSIGN_OPERATORS: ReadonlySet<string> = new Set([
  '=', ':=', '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '<<=', '>>=', '&^=',
]);

const TYPE_KEYWORDS: ReadonlySet<string> = new Set(['func', 'map', 'chan', 'struct', 'interface']);

/**
 * Recursive descent parser for generated source files
 *
 * Checks the whole file against the language grammar: declarations, types,
 * statements and expressions. It builds only an outline of the top-level
 * declarations; its main job is to reject malformed input with a
 * positioned GoSyntaxError.
 */
export class Parser {
  private tokens: Token[] = [];
  private position = 0;
  // Below zero while parsing an if/for/switch header, where `name {` opens
  // the block rather than a composite literal
  private exprLev = 0;

  constructor(private readonly lexer: Lexer = new Lexer()) {}

  parse(source: string): SourceFile {
    this.tokens = this.lexer.tokenize(source).filter(token => token.type !== TokenType.COMMENT);
    this.position = 0;
    this.exprLev = 0;
    return this.parseSourceFile();
  }

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private get current(): Token {
    return this.tokens[this.position];
  }

  private peek(offset = 1): Token {
    return this.tokens[Math.min(this.position + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.current;
    if (token.type !== TokenType.EOF) {
      this.position++;
    }
    return token;
  }

  private isOp(value: string): boolean {
    return isOperator(this.current, value);
  }

  private isKw(value: string): boolean {
    return isKeyword(this.current, value);
  }

  private isSemi(): boolean {
    return this.current.type === TokenType.SEMICOLON;
  }

  private isEOF(): boolean {
    return this.current.type === TokenType.EOF;
  }

  private fail(expected: string): never {
    throw new GoSyntaxError(`expected ${expected}, found ${describeToken(this.current)}`, this.current.loc.start);
  }

  private expectOp(value: string): Token {
    if (!this.isOp(value)) {
      this.fail(`'${value}'`);
    }
    return this.next();
  }

  private expectKw(value: string): Token {
    if (!this.isKw(value)) {
      this.fail(`'${value}'`);
    }
    return this.next();
  }

  private expectIdent(): string {
    if (this.current.type !== TokenType.IDENT) {
      this.fail('identifier');
    }
    return this.next().value;
  }

  /**
   * Statement terminator; may be omitted before a closing bracket
   */
  private expectSemi(): void {
    if (this.isSemi()) {
      this.next();
      return;
    }
    if (this.isOp(')') || this.isOp('}') || this.isEOF()) {
      return;
    }
    this.fail("';' or newline");
  }

  private isTypeStart(token: Token = this.current): boolean {
    switch (token.type) {
      case TokenType.IDENT:
        return true;
      case TokenType.KEYWORD:
        return TYPE_KEYWORDS.has(token.value);
      case TokenType.OPERATOR:
        return token.value === '*' || token.value === '[' || token.value === '(' || token.value === '<-';
      default:
        return false;
    }
  }

  // ---------------------------------------------------------------------------
  // Declarations
  // ---------------------------------------------------------------------------

  private parseSourceFile(): SourceFile {
    this.expectKw('package');
    const packageName = this.expectIdent();
    this.expectSemi();

    const imports: string[] = [];
    while (this.isKw('import')) {
      for (const declaration of this.parseDeclaration()) {
        imports.push(...declaration.names);
      }
      this.expectSemi();
    }

    const declarations: Declaration[] = [];
    while (!this.isEOF()) {
      declarations.push(...this.parseTopLevelDeclaration());
      this.expectSemi();
    }

    return { packageName, imports, declarations };
  }

  private parseTopLevelDeclaration(): Declaration[] {
    if (this.isKw('func')) {
      return [this.parseFuncDeclaration()];
    }
    if (this.isKw('const') || this.isKw('var') || this.isKw('type')) {
      return this.parseDeclaration();
    }
    if (this.isKw('import')) {
      this.fail('declaration; imports must come first');
    }
    this.fail('declaration');
  }

  /**
   * import/const/var/type declaration, single or parenthesized
   */
  private parseDeclaration(): Declaration[] {
    const keyword = this.next();
    const declarations: Declaration[] = [];

    const parseSpec = (): void => {
      const line = this.current.loc.start.line;
      switch (keyword.value) {
        case 'import':
          declarations.push({ kind: 'import', names: [this.parseImportSpec()], line });
          return;
        case 'type':
          declarations.push({ kind: 'type', names: [this.parseTypeSpec()], line });
          return;
        case 'const':
          declarations.push({ kind: 'const', names: this.parseValueSpec(true), line });
          return;
        default:
          declarations.push({ kind: 'var', names: this.parseValueSpec(false), line });
      }
    };

    if (this.isOp('(')) {
      this.next();
      while (!this.isOp(')')) {
        parseSpec();
        this.expectSemi();
      }
      this.next();
    } else {
      parseSpec();
    }

    return declarations;
  }

  private parseImportSpec(): string {
    if (this.isOp('.') || this.current.type === TokenType.IDENT) {
      this.next();
    }
    if (this.current.type !== TokenType.STRING) {
      this.fail('import path');
    }
    return this.next().value.slice(1, -1);
  }

  private parseValueSpec(isConst: boolean): string[] {
    const names = this.parseIdentList();
    let typed = false;
    if (!this.isOp('=') && !this.isSemi() && !this.isOp(')')) {
      this.parseType();
      typed = true;
    }

    if (this.isOp('=')) {
      this.next();
      this.parseExprList();
    } else if (!isConst && !typed) {
      this.fail('type or initializer');
    }
    return names;
  }

  private parseTypeSpec(): string {
    const name = this.expectIdent();
    if (this.isOp('[') && this.isTypeParameterStart()) {
      this.parseTypeParameters();
    }
    if (this.isOp('=')) {
      this.next();
    }
    this.parseType();
    return name;
  }

  // `type List[T any]` declares type parameters, `type Buf [N]byte` an array
  private isTypeParameterStart(): boolean {
    const name = this.peek(1);
    const following = this.peek(2);
    return (
      name.type === TokenType.IDENT &&
      (following.type === TokenType.IDENT ||
        following.type === TokenType.KEYWORD ||
        isOperator(following, ',') ||
        isOperator(following, '~'))
    );
  }

  private parseTypeParameters(): void {
    this.expectOp('[');
    while (!this.isOp(']')) {
      this.parseIdentList();
      this.parseConstraint();
      if (!this.isOp(',')) {
        break;
      }
      this.next();
    }
    this.expectOp(']');
  }

  private parseConstraint(): void {
    for (;;) {
      if (this.isOp('~')) {
        this.next();
      }
      this.parseType();
      if (!this.isOp('|')) {
        return;
      }
      this.next();
    }
  }

  private parseFuncDeclaration(): Declaration {
    const line = this.current.loc.start.line;
    this.expectKw('func');

    let kind: DeclarationKind = 'func';
    if (this.isOp('(')) {
      this.parseParameters();
      kind = 'method';
    }

    const name = this.expectIdent();
    if (this.isOp('[')) {
      this.parseTypeParameters();
    }
    this.parseSignature();
    if (this.isOp('{')) {
      this.parseBlock();
    }
    return { kind, names: [name], line };
  }

  private parseIdentList(): string[] {
    const names = [this.expectIdent()];
    while (this.isOp(',')) {
      this.next();
      names.push(this.expectIdent());
    }
    return names;
  }

  // ---------------------------------------------------------------------------
  // Types
  // ---------------------------------------------------------------------------

  private parseType(): void {
    const token = this.current;

    if (token.type === TokenType.IDENT) {
      this.parseTypeName();
      return;
    }

    if (token.type === TokenType.KEYWORD) {
      switch (token.value) {
        case 'func':
          this.next();
          this.parseSignature();
          return;
        case 'map':
          this.next();
          this.expectOp('[');
          this.parseType();
          this.expectOp(']');
          this.parseType();
          return;
        case 'chan':
          this.next();
          if (this.isOp('<-')) {
            this.next();
          }
          this.parseType();
          return;
        case 'struct':
          this.parseStructType();
          return;
        case 'interface':
          this.parseInterfaceType();
          return;
      }
    }

    if (token.type === TokenType.OPERATOR) {
      switch (token.value) {
        case '*':
          this.next();
          this.parseType();
          return;
        case '(':
          this.next();
          this.parseType();
          this.expectOp(')');
          return;
        case '<-':
          this.next();
          this.expectKw('chan');
          this.parseType();
          return;
        case '[':
          this.parseArrayOrSliceType();
          return;
      }
    }

    this.fail('type');
  }

  private parseTypeName(): void {
    this.expectIdent();
    if (this.isOp('.')) {
      this.next();
      this.expectIdent();
    }

    // type arguments: List[int], Map[string, int]
    if (this.isOp('[')) {
      this.next();
      this.parseType();
      while (this.isOp(',')) {
        this.next();
        if (this.isOp(']')) {
          break;
        }
        this.parseType();
      }
      this.expectOp(']');
    }
  }

  private parseArrayOrSliceType(): void {
    this.expectOp('[');
    if (this.isOp(']')) {
      this.next();
      this.parseType();
      return;
    }
    if (this.isOp('...')) {
      this.next();
      this.expectOp(']');
      this.parseType();
      return;
    }

    this.exprLev++;
    this.parseExpr();
    this.exprLev--;
    this.expectOp(']');
    this.parseType();
  }

  private parseStructType(): void {
    this.expectKw('struct');
    this.expectOp('{');
    while (!this.isOp('}')) {
      this.parseFieldDeclaration();
      this.expectSemi();
    }
    this.next();
  }

  private parseFieldDeclaration(): void {
    if (this.isOp('*')) {
      this.next();
      this.parseTypeName();
    } else if (this.current.type === TokenType.IDENT) {
      const following = this.peek();
      const embedded =
        following.type === TokenType.SEMICOLON ||
        following.type === TokenType.STRING ||
        isOperator(following, '}') ||
        isOperator(following, '.');
      if (embedded) {
        this.parseTypeName();
      } else {
        this.parseIdentList();
        this.parseType();
      }
    } else {
      this.fail('field name or embedded type');
    }

    if (this.current.type === TokenType.STRING) {
      this.next();
    }
  }

  private parseInterfaceType(): void {
    this.expectKw('interface');
    this.expectOp('{');
    while (!this.isOp('}')) {
      if (this.current.type === TokenType.IDENT && isOperator(this.peek(), '(')) {
        this.next();
        this.parseSignature();
      } else {
        this.parseConstraint();
      }
      this.expectSemi();
    }
    this.next();
  }

  private parseSignature(): void {
    this.parseParameters();
    if (this.isOp('(')) {
      this.parseParameters();
    } else if (this.isTypeStart()) {
      this.parseType();
    }
  }

  private parseParameters(): void {
    this.expectOp('(');
    while (!this.isOp(')')) {
      this.parseParameter();
      if (!this.isOp(',')) {
        break;
      }
      this.next();
    }
    this.expectOp(')');
  }

  /**
   * One entry of a parameter list: `name Type`, `name ...Type`, `name`
   * (grouped with a later type) or a bare type
   */
  private parseParameter(): void {
    if (this.current.type === TokenType.IDENT && !isOperator(this.peek(), '.')) {
      this.next();
      if (this.isOp('...')) {
        this.next();
        this.parseType();
      } else if (this.isTypeStart()) {
        this.parseType();
      }
      return;
    }

    if (this.isOp('...')) {
      this.next();
    }
    this.parseType();
  }

  // ---------------------------------------------------------------------------
  // Statements
  // ---------------------------------------------------------------------------

  private parseBlock(): void {
    this.expectOp('{');
    const outer = this.exprLev;
    this.exprLev = 0;
    this.parseStatementList();
    this.exprLev = outer;
    this.expectOp('}');
  }

  private parseStatementList(): void {
    while (!this.isOp('}') && !this.isEOF() && !this.isKw('case') && !this.isKw('default')) {
      this.parseStatement();
      this.expectSemi();
    }
  }

  private parseStatement(): void {
    const token = this.current;

    if (token.type === TokenType.SEMICOLON) {
      return;
    }

    if (token.type === TokenType.KEYWORD) {
      switch (token.value) {
        case 'const':
        case 'var':
        case 'type':
          this.parseDeclaration();
          return;
        case 'go':
        case 'defer':
          this.next();
          this.parseExpr();
          return;
        case 'return':
          this.next();
          if (!this.isSemi() && !this.isOp('}')) {
            this.parseExprList();
          }
          return;
        case 'break':
        case 'continue':
          this.next();
          if (this.current.type === TokenType.IDENT) {
            this.next();
          }
          return;
        case 'goto':
          this.next();
          this.expectIdent();
          return;
        case 'fallthrough':
          this.next();
          return;
        case 'if':
          this.parseIfStatement();
          return;
        case 'switch':
          this.parseSwitchStatement();
          return;
        case 'select':
          this.parseSelectStatement();
          return;
        case 'for':
          this.parseForStatement();
          return;
      }
    }

    if (isOperator(token, '{')) {
      this.parseBlock();
      return;
    }

    // labeled statement
    if (token.type === TokenType.IDENT && isOperator(this.peek(), ':')) {
      this.next();
      this.next();
      if (!this.isOp('}')) {
        this.parseStatement();
      }
      return;
    }

    this.parseSimpleStatement(false);
  }

  private parseSimpleStatement(rangeAllowed: boolean): void {
    if (rangeAllowed && this.isKw('range')) {
      this.next();
      this.parseExpr();
      return;
    }

    this.parseExprList();
    const token = this.current;
    if (token.type !== TokenType.OPERATOR) {
      return;
    }

    if (ASSIGN_OPERATORS.has(token.value)) {
      this.next();
      if (rangeAllowed && this.isKw('range')) {
        this.next();
        this.parseExpr();
        return;
      }
      this.parseExprList();
    } else if (token.value === '++' || token.value === '--') {
      this.next();
    } else if (token.value === '<-') {
      this.next();
      this.parseExpr();
    }
  }

  private withControlClause(parse: () => void): void {
    const outer = this.exprLev;
    this.exprLev = -1;
    parse();
    this.exprLev = outer;
  }

  private parseIfStatement(): void {
    this.expectKw('if');
    this.withControlClause(() => {
      if (!this.isSemi()) {
        this.parseSimpleStatement(false);
      }
      if (this.isSemi()) {
        this.next();
        this.parseSimpleStatement(false);
      }
    });
    this.parseBlock();

    if (this.isKw('else')) {
      this.next();
      if (this.isKw('if')) {
        this.parseIfStatement();
      } else if (this.isOp('{')) {
        this.parseBlock();
      } else {
        this.fail("'if' or '{'");
      }
    }
  }

  private parseSwitchStatement(): void {
    this.expectKw('switch');
    this.withControlClause(() => {
      if (this.isOp('{')) {
        return;
      }
      if (!this.isSemi()) {
        this.parseSimpleStatement(false);
      }
      if (this.isSemi()) {
        this.next();
        if (!this.isOp('{')) {
          this.parseSimpleStatement(false);
        }
      }
    });

    this.expectOp('{');
    while (this.isKw('case') || this.isKw('default')) {
      if (this.next().value === 'case') {
        this.parseExprList();
      }
      this.expectOp(':');
      this.parseStatementList();
    }
    this.expectOp('}');
  }

  private parseSelectStatement(): void {
    this.expectKw('select');
    this.expectOp('{');
    while (this.isKw('case') || this.isKw('default')) {
      if (this.next().value === 'case') {
        this.parseSimpleStatement(false);
      }
      this.expectOp(':');
      this.parseStatementList();
    }
    this.expectOp('}');
  }

  private parseForStatement(): void {
    this.expectKw('for');
    this.withControlClause(() => {
      if (this.isOp('{')) {
        return;
      }
      if (!this.isSemi()) {
        this.parseSimpleStatement(true);
      }
      if (this.isSemi()) {
        // for init; condition; post
        this.next();
        if (!this.isSemi()) {
          this.parseSimpleStatement(false);
        }
        if (!this.isSemi()) {
          this.fail("';'");
        }
        this.next();
        if (!this.isOp('{')) {
          this.parseSimpleStatement(false);
        }
      }
    });
    this.parseBlock();
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  private parseExprList(): void {
    this.parseExpr();
    while (this.isOp(',')) {
      this.next();
      this.parseExpr();
    }
  }

  private parseExpr(): void {
    this.parseBinaryExpr(1);
  }

  private parseBinaryExpr(minPrecedence: number): void {
    this.parseUnaryExpr();
    for (;;) {
      const token = this.current;
      const precedence = token.type === TokenType.OPERATOR ? BINARY_PRECEDENCE.get(token.value) ?? 0 : 0;
      if (precedence < minPrecedence) {
        return;
      }
      this.next();
      this.parseBinaryExpr(precedence + 1);
    }
  }

  private parseUnaryExpr(): void {
    const token = this.current;
    if (token.type === TokenType.OPERATOR) {
      if (UNARY_OPERATORS.has(token.value)) {
        this.next();
        this.parseUnaryExpr();
        return;
      }
      if (token.value === '<-') {
        this.next();
        if (this.isKw('chan')) {
          // <-chan T
          this.next();
          this.parseType();
          return;
        }
        this.parseUnaryExpr();
        return;
      }
    }
    this.parsePrimaryExpr();
  }

  private parsePrimaryExpr(): void {
    let kind = this.parseOperand();

    for (;;) {
      if (this.isOp('.')) {
        this.next();
        if (this.current.type === TokenType.IDENT) {
          this.next();
          continue;
        }
        if (this.isOp('(')) {
          this.next();
          if (this.isKw('type')) {
            this.next();
          } else {
            this.parseType();
          }
          this.expectOp(')');
          kind = 'other';
          continue;
        }
        this.fail('selector or type assertion');
      }

      if (this.isOp('[')) {
        this.parseIndexOrSlice();
        continue;
      }

      if (this.isOp('(')) {
        this.parseCallArguments();
        kind = 'other';
        continue;
      }

      if (this.isOp('{') && (kind === 'literalType' || (kind === 'name' && this.exprLev >= 0))) {
        this.parseLiteralValue();
        kind = 'other';
        continue;
      }

      return;
    }
  }

  private parseOperand(): OperandKind {
    const token = this.current;

    switch (token.type) {
      case TokenType.INT:
      case TokenType.FLOAT:
      case TokenType.IMAG:
      case TokenType.CHAR:
      case TokenType.STRING:
        this.next();
        return 'other';
      case TokenType.IDENT:
        this.next();
        return 'name';
      case TokenType.KEYWORD:
        if (token.value === 'func') {
          this.next();
          this.parseSignature();
          if (this.isOp('{')) {
            this.parseBlock();
          }
          return 'other';
        }
        if (token.value === 'map' || token.value === 'struct') {
          this.parseType();
          return 'literalType';
        }
        if (token.value === 'chan' || token.value === 'interface') {
          this.parseType();
          return 'other';
        }
        break;
      case TokenType.OPERATOR:
        if (token.value === '(') {
          this.next();
          this.exprLev++;
          this.parseExpr();
          this.exprLev--;
          this.expectOp(')');
          return 'other';
        }
        if (token.value === '[') {
          this.parseType();
          return 'literalType';
        }
        break;
    }

    this.fail('expression');
  }

  private parseIndexOrSlice(): void {
    this.expectOp('[');
    this.exprLev++;

    if (!this.isOp(':')) {
      this.parseExpr();
      // instantiation with several type arguments
      while (this.isOp(',')) {
        this.next();
        if (this.isOp(']')) {
          break;
        }
        this.parseExpr();
      }
    }

    let colons = 0;
    while (this.isOp(':') && colons < 2) {
      this.next();
      colons++;
      if (!this.isOp(':') && !this.isOp(']')) {
        this.parseExpr();
      }
    }

    this.exprLev--;
    this.expectOp(']');
  }

  private parseCallArguments(): void {
    this.expectOp('(');
    this.exprLev++;
    while (!this.isOp(')')) {
      this.parseExpr();
      if (this.isOp('...')) {
        this.next();
      }
      if (!this.isOp(',')) {
        break;
      }
      this.next();
    }
    this.exprLev--;
    this.expectOp(')');
  }

  private parseLiteralValue(): void {
    this.expectOp('{');
    this.exprLev++;
    while (!this.isOp('}')) {
      this.parseElement();
      if (this.isOp(':')) {
        this.next();
        this.parseElement();
      }
      if (!this.isOp(',')) {
        break;
      }
      this.next();
    }
    this.exprLev--;
    this.expectOp('}');
  }

  private parseElement(): void {
    if (this.isOp('{')) {
      this.parseLiteralValue();
    } else {
      this.parseExpr();
    }
  }
}

/**
 * Parses source with a fresh parser, returning its outline
 *
 * @throws {GoSyntaxError} When the source is not well-formed
 */
export function parseSource(source: string): SourceFile {
  return new Parser().parse(source);
}
