// src/parser/parser.ts
// 目的: tokens.ts のトークンを用いてCSTを生成するChevrotainパーサーを提供。
// 優先順位（弱い順）: 並置(Phrase) < OR < AND < NOT < +/- < フィールド式
// render.ts の PRECEDENCE と同じ並びであること。

import { CstParser } from 'chevrotain';
import {
  allTokens,
  And,
  AndSymbol,
  Or,
  OrSymbol,
  Not,
  Bang,
  Plus,
  Minus,
  Colon,
  To,
  LParen,
  RParen,
  LBracket,
  RBracket,
  LBrace,
  RBrace,
} from './tokens.ts';
import { ValueToken } from './categories.ts';

export class QueryParser extends CstParser {
  constructor() {
    super(allTokens, {
      recoveryEnabled: false,
    });
    this.performSelfAnalysis();
  }

  // トップレベル: 0個以上の OR 式の並置。2個以上なら Phrase になる
  public query = this.RULE('query', () => {
    this.MANY(() => {
      this.SUBRULE(this.orExpression, { LABEL: 'clauses' });
    });
  });

  // OR は並置の次に弱い。左結合。
  public orExpression = this.RULE('orExpression', () => {
    this.SUBRULE(this.andExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Or) },
        { ALT: () => this.CONSUME(OrSymbol) },
      ]);
      this.SUBRULE2(this.andExpression, { LABEL: 'rhs' });
    });
  });

  // AND は OR より強い。左結合。
  public andExpression = this.RULE('andExpression', () => {
    this.SUBRULE(this.notExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(And) },
        { ALT: () => this.CONSUME(AndSymbol) },
      ]);
      this.SUBRULE2(this.notExpression, { LABEL: 'rhs' });
    });
  });

  // NOT / ! は単項。再帰で NOT NOT a にも対応
  public notExpression = this.RULE('notExpression', () => {
    this.OR([
      {
        ALT: () => {
          this.OR2([
            { ALT: () => this.CONSUME(Not) },
            { ALT: () => this.CONSUME(Bang) },
          ]);
          this.SUBRULE(this.notExpression, { LABEL: 'argument' });
        },
      },
      { ALT: () => this.SUBRULE(this.signedExpression) },
    ]);
  });

  // +a / -a（必須/除外）。NOT より強い
  public signedExpression = this.RULE('signedExpression', () => {
    this.OR([
      {
        ALT: () => {
          this.OR2([
            { ALT: () => this.CONSUME(Plus, { LABEL: 'sign' }) },
            { ALT: () => this.CONSUME(Minus, { LABEL: 'sign' }) },
          ]);
          this.SUBRULE(this.signedExpression, { LABEL: 'argument' });
        },
      },
      { ALT: () => this.SUBRULE(this.primary) },
    ]);
  });

  public primary = this.RULE('primary', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.group) },
      { ALT: () => this.SUBRULE(this.fieldExpression) },
    ]);
  });

  // ( query )
  public group = this.RULE('group', () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.query);
    this.CONSUME(RParen);
  });

  // 曖昧性解決: 'name:value' と 'value' は先頭トークンが共通なので、
  // 先頭を head として読み、Colon が続くかどうかで分岐する（左括り出し）。
  // head がフィールド名として妥当かは visitor 側で検査する。
  public fieldExpression = this.RULE('fieldExpression', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.range) },
      {
        ALT: () => {
          this.CONSUME(ValueToken, { LABEL: 'head' });
          this.OPTION(() => {
            this.CONSUME(Colon);
            this.OR2([
              { ALT: () => this.SUBRULE2(this.range) },
              {
                ALT: () => {
                  // 負の数は name: の後でのみ許す（裸の -5 は除外演算子として読む）
                  this.OPTION2(() => this.CONSUME(Minus, { LABEL: 'sign' }));
                  this.CONSUME2(ValueToken, { LABEL: 'value' });
                },
              },
            ]);
          });
        },
      },
    ]);
  });

  // [a TO b] / {a TO b}
  public range = this.RULE('range', () => {
    this.OR([
      { ALT: () => this.CONSUME(LBracket, { LABEL: 'open' }) },
      { ALT: () => this.CONSUME(LBrace, { LABEL: 'open' }) },
    ]);
    this.OPTION(() => this.CONSUME(Minus, { LABEL: 'lowerSign' }));
    this.CONSUME(ValueToken, { LABEL: 'lower' });
    this.CONSUME(To);
    this.OPTION2(() => this.CONSUME2(Minus, { LABEL: 'upperSign' }));
    this.CONSUME2(ValueToken, { LABEL: 'upper' });
    this.OR2([
      { ALT: () => this.CONSUME(RBracket, { LABEL: 'close' }) },
      { ALT: () => this.CONSUME(RBrace, { LABEL: 'close' }) },
    ]);
  });
}

// performSelfAnalysis は重いので共有インスタンスを使い回す（input の差し替えで状態はリセットされる）
export const queryParser = new QueryParser();
