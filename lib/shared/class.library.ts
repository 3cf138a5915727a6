/**
 * prevents instantiation of a class with only static members
 * eg. class \<MyClass> extends Static
 */
export class Static {
	constructor() {
		throw new TypeError(`${this.constructor.name} is not a constructor`);
	}
}
