import { expect } from 'chai';
import type { FieldNode, OperationDefinitionNode } from 'graphql';
import { Kind, parse } from 'graphql';
import { describe, it } from 'mocha';

import { inputRegistry } from '../../__testUtils__/inputRegistry.js';

import type { ObjMap } from '../../types/ObjMap.js';

import { invariant } from '../../utilities/invariant.js';
import { addPath } from '../../utilities/Path.js';

import {
  ArgumentCoercionErrors,
  CoercionError,
  MissingVariableError,
} from '../../error/errors.js';

import { SkipDirective } from '../../type/directives.js';

import {
  getArgumentValues,
  getDirectiveValues,
  getVariableValues,
} from '../values.js';

function parseOperation(source: string): OperationDefinitionNode {
  const operation = parse(source).definitions[0];
  invariant(operation.kind === Kind.OPERATION_DEFINITION);
  return operation;
}

function parseField(source: string): FieldNode {
  const selection = parseOperation(source).selectionSet.selections[0];
  invariant(selection.kind === Kind.FIELD);
  return selection;
}

function getVariables(
  variableDefinitions: string,
  inputs: ObjMap<unknown>,
  maxErrors?: number,
) {
  const operation = parseOperation(`query (${variableDefinitions}) { plot }`);
  return getVariableValues(
    inputRegistry,
    operation.variableDefinitions ?? [],
    inputs,
    { maxErrors },
  );
}

function getErrorMessages(
  errors: ReadonlyArray<Error> | undefined,
): Array<string> | undefined {
  return errors?.map((error) => error.message);
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  expect.fail('Expected an error to be thrown.');
}

const queryType = inputRegistry.getQueryType();
const plotField = queryType.fields.plot;
const repeatField = queryType.fields.repeat;

describe('getVariableValues', () => {
  it('coerces provided values and applies defaults', () => {
    const result = getVariables('$a: Int, $b: String = "x", $c: Int!', {
      a: 1,
      c: 2,
    });

    expect(result).to.deep.equal({ coerced: { a: 1, b: 'x', c: 2 } });
  });

  it('omits absent nullable variables and keeps explicit nulls', () => {
    expect(getVariables('$a: Int, $b: Int', { b: null })).to.deep.equal({
      coerced: { b: null },
    });
  });

  it('coerces input objects and enums', () => {
    const result = getVariables('$p: Point, $c: Color', {
      p: { x: 1 },
      c: 'RED',
    });

    expect(result).to.deep.equal({
      coerced: { p: { x: 1, y: 0 }, c: '#f00' },
    });
  });

  it('collects every problem', () => {
    const result = getVariables('$a: Int!, $b: Int!, $c: Point', {
      b: null,
      c: {},
    });

    expect(result.coerced).to.equal(undefined);
    expect(getErrorMessages(result.errors)).to.deep.equal([
      'Variable "$a" of required type "Int!" was not provided.',
      'Variable "$b" of non-null type "Int!" must not be null.',
      'Variable "$c" got invalid value {}; Field "x" of required type "Int!" was not provided.',
    ]);
    expect(result.errors?.[0]).to.be.an.instanceOf(MissingVariableError);
    expect(result.errors?.[1]).to.be.an.instanceOf(CoercionError);
  });

  it('names the path of a nested invalid value', () => {
    const result = getVariables('$p: Point', { p: { x: 1, tags: ['a', 2] } });

    expect(getErrorMessages(result.errors)).to.deep.equal([
      'Variable "$p" got invalid value 2 at "p.tags[1]"; String cannot represent a non string value: 2',
    ]);
  });

  it('rejects types that are not input types', () => {
    const result = getVariables('$q: Query, $u: Unknown', {});

    expect(getErrorMessages(result.errors)).to.deep.equal([
      'Variable "$q" expected value of type "Query" which cannot be used as an input type.',
      'Variable "$u" expected value of type "Unknown" which cannot be used as an input type.',
    ]);
  });

  it('reports an invalid default value', () => {
    const result = getVariables('$a: Int = "x"', {});

    expect(getErrorMessages(result.errors)).to.deep.equal([
      'Variable "$a" has invalid default value "x"; Expected value of type "Int", found "x"; Int cannot represent non-integer value: "x"',
    ]);
  });

  it('stops once the error limit is reached', () => {
    const result = getVariables('$a: Int!, $b: Int!, $c: Int!', {}, 2);

    expect(getErrorMessages(result.errors)).to.deep.equal([
      'Variable "$a" of required type "Int!" was not provided.',
      'Variable "$b" of required type "Int!" was not provided.',
      'Too many errors processing variables, error limit reached. Execution aborted.',
    ]);
  });
});

describe('getArgumentValues', () => {
  it('coerces literal arguments', () => {
    const node = parseField('{ plot(point: { x: 1 }, color: GREEN, even: 4) }');

    expect(getArgumentValues(inputRegistry, plotField, node)).to.deep.equal({
      point: { x: 1, y: 0 },
      color: '#0f0',
      even: 4,
    });
  });

  it('omits absent nullable arguments and applies defaults', () => {
    expect(
      getArgumentValues(inputRegistry, plotField, parseField('{ plot }')),
    ).to.deep.equal({});
    expect(
      getArgumentValues(
        inputRegistry,
        repeatField,
        parseField('{ repeat(times: 2) }'),
      ),
    ).to.deep.equal({ times: 2, label: 'x' });
  });

  it('reads variables', () => {
    const node = parseField(
      'query ($t: Int!, $l: String) { repeat(times: $t, label: $l) }',
    );

    expect(
      getArgumentValues(inputRegistry, repeatField, node, { t: 3, l: 'y' }),
    ).to.deep.equal({ times: 3, label: 'y' });
    expect(
      getArgumentValues(inputRegistry, repeatField, node, { t: 3 }),
    ).to.deep.equal({ times: 3, label: 'x' });
  });

  it('reports a missing required argument', () => {
    const error = catchError(() =>
      getArgumentValues(inputRegistry, repeatField, parseField('{ repeat }')),
    );

    expect(error).to.be.an.instanceOf(CoercionError);
    expect(error).to.have.property(
      'message',
      'Argument "times" of required type "Int!" was not provided.',
    );
  });

  it('reports a required argument given a missing variable', () => {
    const node = parseField('query ($t: Int) { repeat(times: $t) }');
    const error = catchError(() =>
      getArgumentValues(inputRegistry, repeatField, node, {}),
    );

    expect(error).to.be.an.instanceOf(MissingVariableError);
    expect(error).to.have.property(
      'message',
      'Argument "times" of required type "Int!" was provided the variable "$t" which was not provided a runtime value.',
    );
  });

  it('reports null given to a non-null argument', () => {
    const literalError = catchError(() =>
      getArgumentValues(
        inputRegistry,
        repeatField,
        parseField('{ repeat(times: null) }'),
      ),
    );
    const variableError = catchError(() =>
      getArgumentValues(
        inputRegistry,
        repeatField,
        parseField('query ($t: Int) { repeat(times: $t) }'),
        { t: null },
      ),
    );

    const message = 'Argument "times" of non-null type "Int!" must not be null.';
    expect(literalError).to.have.property('message', message);
    expect(variableError).to.have.property('message', message);
  });

  it('reports an invalid value with its path inside the argument', () => {
    const error = catchError(() =>
      getArgumentValues(
        inputRegistry,
        plotField,
        parseField('{ plot(point: { x: 1, tags: ["a", 2] }) }'),
      ),
    );

    expect(error).to.be.an.instanceOf(CoercionError);
    expect(error).to.have.property(
      'message',
      'Argument "point" got invalid value 2 at "point.tags[1]"; Expected value of type "String", found 2; String cannot represent a non string value: 2',
    );
    expect(error).to.have.deep.property('inputPath', ['tags', 1]);
  });

  it('reports the errors of several arguments together', () => {
    const error = catchError(() =>
      getArgumentValues(
        inputRegistry,
        repeatField,
        parseField('{ repeat(label: 3) }'),
      ),
    );

    expect(error).to.be.an.instanceOf(ArgumentCoercionErrors);
    expect(error).to.have.property(
      'message',
      'Argument "times" of required type "Int!" was not provided.',
    );
    expect(
      error instanceof ArgumentCoercionErrors
        ? error.errors.map((each) => each.message)
        : [],
    ).to.deep.equal([
      'Argument "times" of required type "Int!" was not provided.',
      'Argument "label" got invalid value 3; Expected value of type "String", found 3; String cannot represent a non string value: 3',
    ]);
  });

  it('reports every invalid element of one argument', () => {
    const error = catchError(() =>
      getArgumentValues(
        inputRegistry,
        plotField,
        parseField('{ plot(point: { x: 1, tags: ["a", 2, "b", 4] }) }'),
      ),
    );

    expect(error).to.be.an.instanceOf(ArgumentCoercionErrors);
    expect(
      error instanceof ArgumentCoercionErrors
        ? error.errors.map((each) => each.inputPath)
        : [],
    ).to.deep.equal([
      ['tags', 1],
      ['tags', 3],
    ]);
    expect(error).to.have.property(
      'message',
      'Argument "point" got invalid value 2 at "point.tags[1]"; Expected value of type "String", found 2; String cannot represent a non string value: 2',
    );
  });

  it('positions the error at the response path', () => {
    const path = addPath(addPath(undefined, 'items', 'Query'), 0, undefined);
    const error = catchError(() =>
      getArgumentValues(
        inputRegistry,
        repeatField,
        parseField('{ repeat }'),
        undefined,
        path,
      ),
    );

    expect(error).to.have.deep.property('path', ['items', 0]);
  });
});

describe('getDirectiveValues', () => {
  it('returns the arguments of a directive present on the node', () => {
    const node = parseField('{ plot @skip(if: true) }');

    expect(
      getDirectiveValues(inputRegistry, SkipDirective, node),
    ).to.deep.equal({ if: true });
  });

  it('reads variables', () => {
    const node = parseField('query ($s: Boolean!) { plot @skip(if: $s) }');

    expect(
      getDirectiveValues(inputRegistry, SkipDirective, node, { s: false }),
    ).to.deep.equal({ if: false });
  });

  it('returns undefined without the directive', () => {
    expect(
      getDirectiveValues(inputRegistry, SkipDirective, parseField('{ plot }')),
    ).to.equal(undefined);
  });
});
