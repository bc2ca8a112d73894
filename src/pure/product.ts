/**
 * PRODUCT
 *
 * An immutable name and price. Single responsibility: it knows nothing about
 * orders, discounts or payments.
 */

import {ProductDetails} from '../domain';
import {validateProductDetails} from './businessLogic';
import {ValidationError} from './ValidationError';
import {Either, NonEmptyList} from 'purify-ts';

export class Product implements ProductDetails {
    readonly name: string;
    readonly price: number;

    /**
     * @throws ValidationError when the name is empty or the price is negative or not finite
     */
    constructor(name: string, price: number) {
        validateProductDetails(name, price).ifLeft(errors => {
            throw new ValidationError(errors);
        });
        this.name = name;
        this.price = price;
    }

    static create(name: string, price: number): Either<NonEmptyList<string>, Product> {
        return Either.encase(() => new Product(name, price))
            .mapLeft(ValidationError.messagesOf);
    }
}
