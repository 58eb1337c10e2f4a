import { IdentifierToken, Location, Token, TokenType } from '../lexer/tokens';
import { Diagnostics } from '../runtime/diagnostics';
import { SprigError, sprigError } from '../runtime/errors';
import { Scope, shadowingError } from '../runtime/scope';
import { SprigLiteral } from '../runtime/values';
import { Var } from '../runtime/var';

type Initializer =
  | { kind: 'none' }
  | { kind: 'literal'; value: SprigLiteral }
  | { kind: 'identifier'; token: IdentifierToken };

interface Binding {
  name: string;
  location: Location;
  initializer: Initializer;
}

type BindingStatus =
  | { kind: 'between' }
  | { kind: 'slot'; opened: Location; name: IdentifierToken | null; initializer: Initializer };

/**
 * Bind the names of a `let` list. `tokens` is the content of the list,
 * without its own parentheses: `(x 1) (y other) z`.
 *
 * The whole list is read before the scope is touched, so an initializer
 * may name anything bound before the `let` but not a sibling binding.
 * A bare name binds `nil`.
 */
export function processBindings(tokens: readonly Token[], scope: Scope): void {
  const bindings = collectBindings(tokens);
  const siblings = new Set(bindings.map(b => b.name));
  const values = bindings.map(binding => initialValue(binding, scope, siblings));

  const problems = new Diagnostics();
  const seen = new Set<string>();
  for (const binding of bindings) {
    if (scope.has(binding.name) || seen.has(binding.name)) {
      problems.extend(shadowingError(binding.name, binding.location));
    }
    seen.add(binding.name);
  }
  if (!problems.isEmpty()) {
    throw new SprigError(problems);
  }

  bindings.forEach((binding, i) => scope.insert(binding.name, values[i], binding.location));
}

function collectBindings(tokens: readonly Token[]): Binding[] {
  const bindings: Binding[] = [];
  let status: BindingStatus = { kind: 'between' };

  for (const token of tokens) {
    if (token.type === TokenType.KEYWORD) {
      throw sprigError(token.location, 'Keywords are not allowed in variable assignments!');
    }

    if (status.kind === 'between') {
      switch (token.type) {
        case TokenType.IDENTIFIER:
          bindings.push({ name: token.name, location: token.location, initializer: { kind: 'none' } });
          break;
        case TokenType.START_STATEMENT:
          status = { kind: 'slot', opened: token.location, name: null, initializer: { kind: 'none' } };
          break;
        case TokenType.LITERAL:
          throw new SprigError(
            new Diagnostics()
              .error(token.location, 'Unknown literal in `let` statement.')
              .note(null, 'Bind it to a variable name.')
              .note(token.location, 'Delete it.'),
          );
        case TokenType.END_STATEMENT:
          throw sprigError(token.location, 'Unmatched closing parentheses!', 'Delete it.');
      }
      continue;
    }

    switch (token.type) {
      case TokenType.START_STATEMENT:
        if (!status.name) {
          throw sprigError(token.location, 'Variable names must be literals!');
        }
        if (status.initializer.kind === 'none') {
          throw sprigError(token.location, 'Variables must be literals or other values (not expressions)!');
        }
        throw new SprigError(
          new Diagnostics()
            .error(token.location, 'Unknown opening parenthesis.')
            .note(token.location, 'Delete it.'),
        );

      case TokenType.IDENTIFIER:
        if (!status.name) {
          status.name = token;
        } else if (status.initializer.kind === 'none') {
          status.initializer = { kind: 'identifier', token };
        } else {
          throw new SprigError(
            new Diagnostics()
              .error(token.location, 'Identifier not allowed here!')
              .note(token.location, 'Remove it.'),
          );
        }
        break;

      case TokenType.LITERAL:
        if (!status.name) {
          throw sprigError(token.location, 'Cannot assign to literal value!');
        }
        if (status.initializer.kind !== 'none') {
          throw new SprigError(
            new Diagnostics()
              .error(token.location, 'Value not allowed here!')
              .note(token.location, 'Remove it.'),
          );
        }
        status.initializer = { kind: 'literal', value: token.value };
        break;

      case TokenType.END_STATEMENT:
        if (!status.name) {
          throw sprigError(status.opened, 'Variable bindings must name a variable!', 'Write the binding as `(name value)`.');
        }
        if (status.initializer.kind === 'none') {
          throw new SprigError(
            new Diagnostics()
              .error(status.opened, 'Variable defined in parentheses must have an initial value.')
              .note(status.opened, 'Remove the parentheses around it.'),
          );
        }
        bindings.push({ name: status.name.name, location: status.name.location, initializer: status.initializer });
        status = { kind: 'between' };
        break;
    }
  }

  return bindings;
}

function initialValue(binding: Binding, scope: Scope, siblings: ReadonlySet<string>): Var {
  const { initializer } = binding;
  switch (initializer.kind) {
    case 'none':
      return Var.nil();
    case 'literal':
      return Var.of({ ...initializer.value });
    case 'identifier': {
      const { name, location } = initializer.token;
      if (siblings.has(name)) {
        throw sprigError(location, 'Making a variable depend upon another in the statement is not currently implemented!');
      }
      const bound = scope.get(name);
      if (!bound) {
        throw sprigError(location, `Unknown identifier \`${name}\`!`);
      }
      return bound.newRef();
    }
  }
}
