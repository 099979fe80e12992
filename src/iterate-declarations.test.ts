import { describe, it, expect } from 'vitest';
import { extractDeclarations } from './iterate-declarations';
import { MalformedSourceError } from './errors';
import { getSpanText } from './graph';
import { createSourceFile, lines } from './test-utils';

function extract(text: string) {
    return extractDeclarations(createSourceFile(text));
}

function extractError(text: string) {
    try {
        extract(text);
    } catch(e: unknown) {
        return e;
    }
    throw new Error('Expected extraction to fail');
}

describe('extractDeclarations', () => {
    const contract = lines(
        'pragma solidity ^0.8.0;',
        '',
        'contract A is B, C {',
        '    /// @notice does x',
        '    function foo(uint a) public view returns (uint) {',
        '        if (a > 0) { return a; }',
        '        return 1;',
        '    }',
        '',
        '    function bar() internal virtual override(B, C);',
        '}',
        '',
    );

    it('finds declarations in file order', () => {
        expect(extract(contract).map(d => d.name)).toEqual(['foo', 'bar']);
    });

    it('records modifiers from the header', () => {
        const [foo, bar] = extract(contract);
        expect(foo.visibility).toBe('public');
        expect(foo.stateMutability).toBe('view');
        expect(foo.isOverride).toBe(false);
        expect(foo.isVirtual).toBe(false);
        expect(bar.visibility).toBe('internal');
        expect(bar.stateMutability).toBe('nonpayable');
        expect(bar.isOverride).toBe(true);
        expect(bar.isVirtual).toBe(true);
    });

    it('covers NatSpec and the whole body in the full span', () => {
        const [foo] = extract(contract);
        expect(getSpanText(foo)).toBe(lines(
            '/// @notice does x',
            '    function foo(uint a) public view returns (uint) {',
            '        if (a > 0) { return a; }',
            '        return 1;',
            '    }',
        ));
        expect(contract.slice(foo.signatureSpan.start, foo.signatureSpan.end)).toBe('function foo(uint a) public view returns (uint) ');
        expect(foo.nameStart).toBe(contract.indexOf('foo('));
        expect(foo.bodySpan).toEqual({start: contract.indexOf('{\n        if'), end: foo.span.end});
    });

    it('ends bodiless declarations at the semicolon', () => {
        const [, bar] = extract(contract);
        expect(bar.bodySpan).toBeNull();
        expect(contract.slice(bar.span.fullStart, bar.span.end)).toBe('function bar() internal virtual override(B, C);');
        expect(bar.span.fullStart).toBe(bar.span.start);
    });

    it('keeps the full span strictly around the signature', () => {
        for(const d of extract(contract)) {
            expect(d.span.fullStart).toBeLessThanOrEqual(d.signatureSpan.start);
            expect(d.span.end).toBeGreaterThan(d.signatureSpan.end);
        }
    });

    it('returns one record per declaration with disjoint spans', () => {
        const source = lines(
            'function a() internal {} function b() internal { a(); }',
            'contract C {',
            '    function c() private pure returns (uint) { return 1; }',
            '    function d() external;',
            '    function e() internal { { } }',
            '}',
        );
        const declarations = extract(source);
        expect(declarations.map(d => d.name)).toEqual(['a', 'b', 'c', 'd', 'e']);
        for(let i = 1; i < declarations.length; i++) {
            expect(declarations[i].span.fullStart).toBeGreaterThanOrEqual(declarations[i - 1].span.end);
        }
        expect(declarations.map(getSpanText)).toEqual([
            'function a() internal {}',
            'function b() internal { a(); }',
            'function c() private pure returns (uint) { return 1; }',
            'function d() external;',
            'function e() internal { { } }',
        ]);
    });

    it('ignores declarations inside string literals and comments', () => {
        const source = lines(
            'contract D {',
            '    string constant s = "function decoy() public {}";',
            '    // function commented() public {}',
            '    /* function blocked() public { */',
            '}',
        );
        expect(extract(source)).toEqual([]);
    });

    it('does not let braces in strings or comments change the body depth', () => {
        const source = lines(
            'function f() internal {',
            '    string memory s = "}"; // }',
            '    /* { */',
            '}',
            'function g() internal {}',
        );
        const declarations = extract(source);
        expect(declarations.map(d => d.name)).toEqual(['f', 'g']);
        expect(getSpanText(declarations[0]).endsWith('/* { */\n}')).toBe(true);
    });

    it('skips function types', () => {
        const source = lines(
            'contract T {',
            '    function (uint) external returns (bool) callback;',
            '    function h(function (uint) external f) internal {}',
            '}',
        );
        expect(extract(source).map(d => d.name)).toEqual(['h']);
    });

    it('does not extract Yul functions nested in a body', () => {
        const source = lines(
            'function outer() internal {',
            '    assembly {',
            '        function inner(x) -> y { y := x }',
            '    }',
            '}',
        );
        expect(extract(source).map(d => d.name)).toEqual(['outer']);
    });

    it('skips constructor, modifier, fallback and receive bodies along with their Yul functions', () => {
        const source = lines(
            'contract Y {',
            '    constructor(uint a) Base({x: a}) {',
            '        assembly { function helper(x) -> y { y := x } }',
            '    }',
            '    modifier m() {',
            '        assembly { function h2() {} }',
            '        _;',
            '    }',
            '    modifier abstractOne() virtual;',
            '    fallback() external payable { assembly { function h3() {} } }',
            '    receive() external payable { assembly { function h4() {} } }',
            '    function () external { assembly { function h5() {} } }',
            '    function kept() internal {}',
            '}',
        );
        expect(extract(source).map(d => d.name)).toEqual(['kept']);
    });

    it('leaves a doc comment that trails code on its line to that code', () => {
        const source = lines(
            'contract A {',
            '    uint public x; /// @notice the x',
            '    /// @notice dead',
            '    function dead() internal {}',
            '}',
        );
        const [dead] = extract(source);
        expect(getSpanText(dead)).toBe('/// @notice dead\n    function dead() internal {}');
    });

    it('extracts overloads as separate declarations', () => {
        const source = 'function over(uint a) internal {}\nfunction over(bool b) internal {}';
        const declarations = extract(source);
        expect(declarations.map(d => d.name)).toEqual(['over', 'over']);
        expect(declarations[0].nameStart).toBe(9);
        expect(declarations[1].nameStart).toBe(source.lastIndexOf('over'));
    });

    it('fails with MalformedSource when a body never closes', () => {
        const e = extractError(lines(
            'contract Bad {',
            '    function broken() internal {',
            '        uint x = 1;',
        ));
        expect(e).toBeInstanceOf(MalformedSourceError);
        expect(e).toMatchObject({code: 'MalformedSource', line: 2, message: 'Body of function broken is never closed'});
    });

    it('fails with MalformedSource when a header never closes', () => {
        const e = extractError('function nope() internal');
        expect(e).toMatchObject({code: 'MalformedSource', line: 1, message: 'Header of function nope is never closed'});
    });

    it('fails with MalformedSource on an unterminated block comment', () => {
        const e = extractError('function a() internal {}\n/* never closed');
        expect(e).toMatchObject({code: 'MalformedSource', line: 2, message: 'Block comment is never closed'});
    });
});
